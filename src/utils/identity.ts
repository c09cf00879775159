import type { SessionId } from '../types/Session.js';
import type { DisplayNumber } from '../types/Display.js';
import { invalidRequest } from './errors.js';

const SESSION_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

export function isValidSessionName(name: string): boolean {
  return SESSION_NAME_PATTERN.test(name);
}

/**
 * Canonicalizes a client-supplied session name into the prefixed tmux name.
 * Names already carrying the prefix are returned unchanged.
 */
export function toSessionId(raw: string, prefix: string): SessionId {
  const name = raw.trim();
  if (!name) {
    throw invalidRequest('Session name is required');
  }
  if (!SESSION_NAME_PATTERN.test(name)) {
    throw invalidRequest(`Invalid session name: ${name}`);
  }
  const full = name.startsWith(prefix) ? name : `${prefix}${name}`;
  return full as SessionId;
}

export function toDisplayNumber(raw: number | string): DisplayNumber {
  const value = typeof raw === 'number' ? raw : Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw invalidRequest(`Invalid display number: ${raw}`);
  }
  return value as DisplayNumber;
}
