import { createHash } from 'node:crypto';
import { InvalidShardIdentifierError } from './types.js';

export const MAX_IDENTIFIER_LENGTH = 256;

// Control characters and whitespace
const FORBIDDEN = /[\u0000-\u001f\u007f\s]/u;

export function isValidShardIdentifier(identifier: string): boolean {
  return identifier.length > 0
    && identifier.length <= MAX_IDENTIFIER_LENGTH
    && !FORBIDDEN.test(identifier);
}

/**
 * Derive the instance id for `identifier` within `namespace`
 */
export function deriveInstanceId(namespace: string, identifier: string): string {
  if (!isValidShardIdentifier(identifier)) {
    throw new InvalidShardIdentifierError(identifier);
  }
  return createHash('sha256').update(`${namespace}:${identifier}`).digest('hex');
}

/**
 * Percent-decode a raw path segment into a shard identifier
 */
export function decodeShardSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) {
      throw new InvalidShardIdentifierError(segment);
    }
    throw error;
  }
}
