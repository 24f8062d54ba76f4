import { createHash } from 'node:crypto';

export function sha256Hex(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

// Keys are bearer credentials; logs only ever see this prefix of their digest.
export function fingerprintToken(token: string): string {
  return sha256Hex(token).substring(0, 16);
}
