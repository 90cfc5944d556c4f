import { createHash } from 'node:crypto';

export const CONVERSATION_KEY_PREFIX = 'dm_';

export function sortedPair(userA: string, userB: string): [string, string] {
  return userA < userB ? [userA, userB] : [userB, userA];
}

/**
 * Same id for (a, b) and (b, a). The pair is length-prefixed before hashing
 * so ids containing the separator cannot collide.
 */
export function conversationKeyFor(userA: string, userB: string): string {
  const [first, second] = sortedPair(userA, userB);
  const digest = createHash('sha256').update(`${first.length}:${first}|${second}`).digest('hex');
  return `${CONVERSATION_KEY_PREFIX}${digest.slice(0, 40)}`;
}
