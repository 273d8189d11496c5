/**
 * Event map for the chat backend.
 * Each kind maps to the positional arguments its handler receives.
 */
import type {
  EventErrorPayload,
  EventHeartbeatPayload,
  EventReadyPayload,
  ScanStatus,
} from '@chatplug/core';
import type { Contact, Friendship, Message, Room, RoomInvitation } from '@chatplug/entities';

export interface ChatEventMap {
  error: [payload: EventErrorPayload];
  heartbeat: [payload: EventHeartbeatPayload];
  ready: [payload: EventReadyPayload];
  friendship: [friendship: Friendship];
  login: [contact: Contact];
  logout: [contact: Contact];
  message: [message: Message];
  'room-invite': [invitation: RoomInvitation];
  'room-join': [room: Room, invitees: Contact[], inviter: Contact, date: Date];
  'room-leave': [room: Room, leavers: Contact[], remover: Contact, date: Date];
  'room-topic': [room: Room, newTopic: string, oldTopic: string, changer: Contact, date: Date];
  scan: [qrCode: string, status: ScanStatus, data?: string];
}

export type ChatEventKind = keyof ChatEventMap;

/** Tagged union of every event with its exact payload */
export type ChatEvent = {
  [K in ChatEventKind]: { kind: K; args: ChatEventMap[K] };
}[ChatEventKind];

/** Human-readable argument lists, used in contract violation messages */
export const EVENT_SIGNATURES: Readonly<Record<ChatEventKind, string>> = {
  error: 'payload',
  heartbeat: 'payload',
  ready: 'payload',
  friendship: 'friendship',
  login: 'contact',
  logout: 'contact',
  message: 'message',
  'room-invite': 'roomInvitation',
  'room-join': 'room, invitees, inviter, date',
  'room-leave': 'room, leavers, remover, date',
  'room-topic': 'room, newTopic, oldTopic, changer, date',
  scan: 'qrCode, status, data?',
};

export function isEventKind(kind: string): kind is ChatEventKind {
  return Object.hasOwn(EVENT_SIGNATURES, kind);
}
