/**
 * Task id generator (UUID v7: time-ordered, 74 random bits)
 */

import { randomBytes } from 'crypto';

/**
 * Generate a UUID v7
 * Layout: 48-bit unix ms timestamp | version 7 | 12 random bits | variant 10 | 62 random bits
 */
export function generateTaskId(now: number = Date.now()): string {
  const bytes = randomBytes(16);

  // Big-endian 48-bit timestamp in bytes 0-5
  bytes.writeUIntBE(now, 0, 6);

  // Version nibble
  bytes[6] = (bytes[6] & 0x0f) | 0x70;

  // RFC 4122 variant
  bytes[8] = (bytes[8] & 0x3f) | 0x80;

  const hex = bytes.toString('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

/**
 * Creation time (unix ms) encoded in a task id
 */
export function taskIdTimestamp(taskId: string): number {
  return parseInt(taskId.replace(/-/g, '').slice(0, 12), 16);
}
