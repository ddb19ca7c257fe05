import { randomInt } from 'node:crypto';

import { NOT_FOUND_SLUG_LENGTH } from '../config/constants.js';

const SLUG_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';

export function generateNotFoundSlug(length = NOT_FOUND_SLUG_LENGTH): string {
  let slug = '';
  for (let i = 0; i < length; i++) {
    slug += SLUG_ALPHABET.charAt(randomInt(SLUG_ALPHABET.length));
  }
  return slug;
}

/** Path of a page that should not exist on any real server. */
export function generateNotFoundPath(): string {
  return `${generateNotFoundSlug()}.html`;
}
