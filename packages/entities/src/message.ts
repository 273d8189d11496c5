import { extractMentionText, type MessagePayload, type MessageType } from '@chatplug/core';
import { Accessory } from './accessory.js';
import { Contact } from './contact.js';
import { Room } from './room.js';

export class Message extends Accessory<MessagePayload> {
  protected loadPayload(): Promise<MessagePayload> {
    return this.puppet.messagePayload(this.id);
  }

  text(): string {
    return this.requirePayload().text;
  }

  type(): MessageType {
    return this.requirePayload().type;
  }

  date(): Date | null {
    const { timestamp } = this.requirePayload();
    return timestamp === undefined ? null : new Date(timestamp);
  }

  talker(): Contact | null {
    const { talkerId } = this.requirePayload();
    return talkerId ? new Contact(this.puppet, talkerId) : null;
  }

  room(): Room | null {
    const { roomId } = this.requirePayload();
    return roomId ? new Room(this.puppet, roomId) : null;
  }

  /** Members the backend reported as mentioned, in its order. */
  mentionIds(): string[] {
    return [...(this.requirePayload().mentionIds ?? [])];
  }

  async mentionList(): Promise<Contact[]> {
    const contacts = this.mentionIds().map((id) => new Contact(this.puppet, id));
    await Promise.all(contacts.map((c) => c.ready()));
    return contacts;
  }

  /**
   * Text with the `@name` tokens of mentioned members removed. Outside a
   * room, or without reported mentions, the text is returned as is.
   */
  async mentionText(): Promise<string> {
    const text = this.text();
    const mentionIds = this.mentionIds();
    const room = this.room();
    if (!room || mentionIds.length === 0) return text;

    const directory = await room.memberDirectory(mentionIds);
    return extractMentionText(text, directory, mentionIds);
  }

  /** Reply into the room the message came from, or to its talker. */
  async say(text: string): Promise<void> {
    const { roomId, talkerId } = this.requirePayload();
    const conversationId = roomId ?? talkerId;
    if (!conversationId) {
      throw new Error(`Message <${this.id}> has neither a room nor a talker to reply to`);
    }
    await this.puppet.messageSendText(conversationId, text);
  }
}
