/**
 * Entry ids: 16 characters of [0-9A-Za-z], safe in URLs and file names
 */

import { customAlphabet } from 'nanoid';

export const ENTRY_ID_LENGTH = 16;
export const ENTRY_ID_PATTERN = /^[0-9A-Za-z]{16}$/;

export const generateEntryId = customAlphabet(
  '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz',
  ENTRY_ID_LENGTH
);

export function isEntryId(value: string): boolean {
  return ENTRY_ID_PATTERN.test(value);
}
