/**
 * Argument contracts per event kind. Validation happens before any plugin
 * is touched, so a violation means no handler ran.
 */
import { z } from 'zod';
import { EventContractViolation, SCAN_STATUSES } from '@chatplug/core';
import { Contact, Friendship, Message, Room, RoomInvitation } from '@chatplug/entities';
import { EVENT_SIGNATURES, isEventKind, type ChatEvent, type ChatEventKind } from './types.js';

const contact = z.instanceof(Contact);
const room = z.instanceof(Room);
const date = z.date();
const payload = z.object({ data: z.string() });
const scanStatus = z.enum(SCAN_STATUSES);

function contract<K extends ChatEventKind, A extends z.ZodTypeAny>(kind: K, args: A) {
  return z.object({ kind: z.literal(kind), args });
}

export const chatEventSchema = z.discriminatedUnion('kind', [
  contract('error', z.tuple([payload])),
  contract('heartbeat', z.tuple([payload])),
  contract('ready', z.tuple([payload])),
  contract('friendship', z.tuple([z.instanceof(Friendship)])),
  contract('login', z.tuple([contact])),
  contract('logout', z.tuple([contact])),
  contract('message', z.tuple([z.instanceof(Message)])),
  contract('room-invite', z.tuple([z.instanceof(RoomInvitation)])),
  contract('room-join', z.tuple([room, z.array(contact), contact, date])),
  contract('room-leave', z.tuple([room, z.array(contact), contact, date])),
  contract('room-topic', z.tuple([room, z.string(), z.string(), contact, date])),
  contract(
    'scan',
    z.union([
      z.tuple([z.string(), scanStatus]),
      z.tuple([z.string(), scanStatus, z.string().optional()]),
    ]),
  ),
]);

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const position = issue.path.slice(1).join('.');
      return position ? `argument ${position}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Validate raw positional arguments for an event kind and return the typed
 * event. Throws EventContractViolation for unknown kinds and for any arity
 * or type mismatch.
 */
export function parseEvent(kind: string, args: readonly unknown[]): ChatEvent {
  if (!isEventKind(kind)) {
    throw new EventContractViolation(kind, args.length, 'unknown event kind');
  }

  const result = chatEventSchema.safeParse({ kind, args });
  if (!result.success) {
    throw new EventContractViolation(
      kind,
      args.length,
      `expected (${EVENT_SIGNATURES[kind]}); ${describeIssues(result.error)}`,
    );
  }
  return result.data;
}
