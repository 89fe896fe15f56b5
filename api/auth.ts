// Filename: api/auth.ts

import { timingSafeEqual } from 'crypto';
import type { ApiUser } from '../config/configService.js';

export const AUTH_REALM = 'Statistics API';

/**
 * Decodes an `Authorization: Basic ...` header.
 * @returns the credentials, or null when the header is absent or malformed
 */
export function parseBasicAuth(header: string | undefined): ApiUser | null {
  if (!header) return null;
  const match = header.match(/^Basic\s+(.+)$/i);
  if (!match) return null;

  const decoded = Buffer.from(match[1].trim(), 'base64').toString('utf-8');
  const separator = decoded.indexOf(':');
  if (separator < 0) return null;
  return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf-8');
  const right = Buffer.from(b, 'utf-8');
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}

/**
 * Checks a Basic auth header against the configured users.
 * @returns the matching username, or null
 */
export function authenticate(header: string | undefined, users: readonly ApiUser[]): string | null {
  const credentials = parseBasicAuth(header);
  if (!credentials) return null;
  for (const user of users) {
    const userMatches = safeEqual(credentials.username, user.username);
    const passwordMatches = safeEqual(credentials.password, user.password);
    if (userMatches && passwordMatches) return user.username;
  }
  return null;
}
