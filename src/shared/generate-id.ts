import { randomUUID } from 'node:crypto';

/** Process-unique identifier for chips and sockets. */
export function generateId(): string {
  return randomUUID();
}
