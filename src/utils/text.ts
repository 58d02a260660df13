import { createHash } from 'node:crypto';

const INVISIBLE_CONTROL_REGEX = /[\u200b-\u200f\u202a-\u202e\u2060-\u206f\ufeff]/g;

export const CONTENT_HASH_LENGTH = 16;

export function normalizeForDedup(text: string): string {
  return text
    .replace(INVISIBLE_CONTROL_REGEX, '')
    .normalize('NFKC')
    .trim()
    .toLowerCase();
}

/** First 16 hex chars of sha256 over the normalized text. */
export function hashContent(text: string): string {
  return createHash('sha256')
    .update(normalizeForDedup(text), 'utf8')
    .digest('hex')
    .slice(0, CONTENT_HASH_LENGTH);
}

export function joinMessageText(text: string | null | undefined, caption?: string | null): string {
  return [text, caption]
    .filter((value): value is string => typeof value === 'string' && value !== '')
    .join(' ');
}
