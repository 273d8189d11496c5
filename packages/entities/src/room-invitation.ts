import type { RoomInvitationPayload } from '@chatplug/core';
import { Accessory } from './accessory.js';
import { Contact } from './contact.js';

export class RoomInvitation extends Accessory<RoomInvitationPayload> {
  protected loadPayload(): Promise<RoomInvitationPayload> {
    return this.puppet.roomInvitationPayload(this.id);
  }

  inviter(): Contact {
    return new Contact(this.puppet, this.requirePayload().inviterId);
  }

  topic(): string {
    return this.requirePayload().topic;
  }
}
