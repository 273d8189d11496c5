// ============================================================================
// Payloads served by the chat backend
// ============================================================================

export interface ContactPayload {
  id: string;
  name: string;
  alias?: string;
}

export interface RoomPayload {
  id: string;
  topic: string;
  memberIds: string[];
  ownerId?: string;
}

/** Per-room view of a member; `roomAlias` overrides the contact name inside the room. */
export interface RoomMemberPayload {
  id: string;
  roomAlias?: string;
}

export const MessageType = {
  Unknown: 'unknown',
  Text: 'text',
  Image: 'image',
  Url: 'url',
} as const;

export type MessageType = (typeof MessageType)[keyof typeof MessageType];

export interface MessagePayload {
  id: string;
  type: MessageType;
  text: string;
  talkerId?: string;
  roomId?: string;
  /** Members the backend reports as structurally mentioned */
  mentionIds?: string[];
  timestamp?: number;
}

export interface FriendshipPayload {
  id: string;
  contactId: string;
  hello?: string;
}

export interface RoomInvitationPayload {
  id: string;
  inviterId: string;
  topic: string;
  receiverId?: string;
}

export interface EventErrorPayload {
  data: string;
}

export interface EventHeartbeatPayload {
  data: string;
}

export interface EventReadyPayload {
  data: string;
}

export const SCAN_STATUSES = [
  'unknown',
  'cancel',
  'waiting',
  'scanned',
  'confirmed',
  'timeout',
] as const;

export type ScanStatus = (typeof SCAN_STATUSES)[number];

// ============================================================================
// Backend boundary
// ============================================================================

/**
 * Transport to the chat platform. Implemented elsewhere; the plugin layer
 * only looks payloads up through it and sends replies.
 */
export interface Puppet {
  contactPayload(contactId: string): Promise<ContactPayload>;
  roomPayload(roomId: string): Promise<RoomPayload>;
  roomMemberPayload(roomId: string, contactId: string): Promise<RoomMemberPayload | null>;
  messagePayload(messageId: string): Promise<MessagePayload>;
  friendshipPayload(friendshipId: string): Promise<FriendshipPayload>;
  roomInvitationPayload(invitationId: string): Promise<RoomInvitationPayload>;
  messageSendText(conversationId: string, text: string): Promise<void>;
}

// ============================================================================
// Mentions
// ============================================================================

export interface MemberIdentity {
  name: string;
  roomAlias?: string;
}

/** member id → identity, for a single room */
export type MemberDirectory = Readonly<Record<string, MemberIdentity>>;
