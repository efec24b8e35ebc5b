import { randomUUID } from 'crypto';

/**
 * 10 hexadecimala tecken, t.ex. för gårds-id och egna produkter
 */
export function newShortId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 10);
}
