import type { FriendshipPayload } from '@chatplug/core';
import { Accessory } from './accessory.js';
import { Contact } from './contact.js';

export class Friendship extends Accessory<FriendshipPayload> {
  protected loadPayload(): Promise<FriendshipPayload> {
    return this.puppet.friendshipPayload(this.id);
  }

  contact(): Contact {
    return new Contact(this.puppet, this.requirePayload().contactId);
  }

  hello(): string {
    return this.requirePayload().hello ?? '';
  }
}
