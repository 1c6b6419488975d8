import { createHash } from 'node:crypto';

/**
 * Deterministic fingerprint of a recipient address for log entries, so delivery problems
 * can be correlated without writing the address itself.
 */
export const hashEmail = (email: string): string =>
  createHash('sha256').update(email.trim().toLowerCase()).digest('hex');
