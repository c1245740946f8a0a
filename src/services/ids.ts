/**
 * Response identifiers and timestamps
 */

import { v4 as uuidv4 } from 'uuid';

const COMPLETION_ID_PREFIX = 'chatcmpl-';

/**
 * Generate a unique ID for responses and chunk sequences
 */
export function generateCompletionId(): string {
  return `${COMPLETION_ID_PREFIX}${uuidv4().replace(/-/g, '')}`;
}

/**
 * Current time in whole seconds since the epoch
 */
export function currentTimestamp(): number {
  return Math.floor(Date.now() / 1000);
}
