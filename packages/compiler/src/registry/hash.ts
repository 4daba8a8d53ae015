/**
 * Content hashing for function deduplication.
 *
 * @module registry/hash
 */

import { createHash } from 'node:crypto';

/** Maps text to a lowercase hex digest. Injectable so tests can force collisions. */
export type HashFunction = (input: string) => string;

export const sha256: HashFunction = (input) => createHash('sha256').update(input, 'utf-8').digest('hex');
