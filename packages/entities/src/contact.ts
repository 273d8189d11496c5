import type { ContactPayload } from '@chatplug/core';
import { Accessory } from './accessory.js';

export class Contact extends Accessory<ContactPayload> {
  protected loadPayload(): Promise<ContactPayload> {
    return this.puppet.contactPayload(this.id);
  }

  name(): string {
    return this.requirePayload().name;
  }

  /** Alias the logged-in account gave this contact, if any. */
  alias(): string | null {
    return this.requirePayload().alias ?? null;
  }

  async say(text: string): Promise<void> {
    await this.puppet.messageSendText(this.id, text);
  }
}
