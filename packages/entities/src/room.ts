import type { MemberDirectory, MemberIdentity, RoomPayload } from '@chatplug/core';
import { Accessory } from './accessory.js';
import { Contact } from './contact.js';

export class Room extends Accessory<RoomPayload> {
  protected loadPayload(): Promise<RoomPayload> {
    return this.puppet.roomPayload(this.id);
  }

  topic(): string {
    return this.requirePayload().topic;
  }

  memberIds(): string[] {
    return [...this.requirePayload().memberIds];
  }

  /** Room-specific display name of a member, or null when none is set. */
  async alias(contact: Contact): Promise<string | null> {
    const member = await this.puppet.roomMemberPayload(this.id, contact.id);
    return member?.roomAlias || null;
  }

  /**
   * Names and room aliases for the given members (all members by default).
   */
  async memberDirectory(memberIds: readonly string[] = this.memberIds()): Promise<MemberDirectory> {
    const entries = await Promise.all(
      memberIds.map(async (id): Promise<[string, MemberIdentity]> => {
        const contact = new Contact(this.puppet, id);
        await contact.ready();
        const roomAlias = await this.alias(contact);
        return [id, roomAlias ? { name: contact.name(), roomAlias } : { name: contact.name() }];
      }),
    );
    return Object.fromEntries(entries);
  }

  async say(text: string): Promise<void> {
    await this.puppet.messageSendText(this.id, text);
  }
}
