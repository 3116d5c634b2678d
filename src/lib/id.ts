import { customAlphabet } from 'nanoid';

const alphabet = 'abcdefghijklmnopqrstuvwxyz0123456789';

const shortId = customAlphabet(alphabet, 8);

export function sessionId(): string {
  return `rs-${shortId()}`;
}
