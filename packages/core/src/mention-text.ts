import type { MemberDirectory, MemberIdentity } from './types.js';
import { escapeRegex } from './utils.js';

export const MENTION_MARKER = '@';

// Clients separate a mention from what follows with a four-per-em space
// (U+2005) or a plain space.
const MENTION_SEPARATOR = '[\\u2005\\u0020]';

/**
 * The literal token a client renders for a mention of this member.
 * A room alias replaces the name entirely: a member with an alias is only
 * ever mentioned as `@alias`.
 */
export function mentionToken(identity: MemberIdentity): string | null {
  const label = identity.roomAlias || identity.name;
  return label ? `${MENTION_MARKER}${label}` : null;
}

/**
 * Remove the `@name` tokens of the mentioned members from a message text.
 *
 * `mentionedIds` decides which tokens may be removed; the text decides
 * whether they are. Ids missing from the directory, and tokens that do not
 * literally occur, are ignored.
 *
 * With no mentioned ids the text is returned verbatim. Otherwise the result
 * is always trimmed, even when nothing was removed.
 */
export function extractMentionText(
  text: string,
  directory: MemberDirectory,
  mentionedIds: readonly string[],
): string {
  if (mentionedIds.length === 0) return text;

  const tokens = new Set<string>();
  for (const id of mentionedIds) {
    if (!Object.hasOwn(directory, id)) continue;
    const token = mentionToken(directory[id]);
    if (token) tokens.add(token);
  }
  if (tokens.size === 0) return text.trim();

  // Longest first, so "@Ann Lee" wins over "@Ann" at the same position.
  const alternatives = [...tokens]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegex)
    .join('|');
  const pattern = new RegExp(`(?:${alternatives})(?:${MENTION_SEPARATOR}|$)`, 'g');

  return text.replace(pattern, '').trim();
}
