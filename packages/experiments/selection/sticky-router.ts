/**
 * Sticky routing
 *
 * Deterministic subject-to-trial assignment. The same subject, selector and
 * trial set always produce the same key, in every process, regardless of the
 * order trials were declared in.
 */

import { createHash } from 'crypto';

/**
 * Bucket index for `subjectId` among `bucketCount` buckets.
 * SHA-256 of `subjectId:selectorName`, first four bytes read as an unsigned
 * big-endian integer, modulo the bucket count.
 */
export function stickyBucket(subjectId: string, selectorName: string, bucketCount: number): number {
  if (!Number.isInteger(bucketCount) || bucketCount < 1) {
    throw new RangeError(`Bucket count must be a positive integer, got ${bucketCount}`);
  }
  const digest = createHash('sha256').update(`${subjectId}:${selectorName}`, 'utf8').digest();
  return digest.readUInt32BE(0) % bucketCount;
}

/**
 * Pick a trial key for a subject. Keys are sorted ordinally first.
 * @throws RangeError when `trialKeys` is empty
 */
export function selectStickyTrial(subjectId: string, selectorName: string, trialKeys: readonly string[]): string {
  if (trialKeys.length === 0) {
    throw new RangeError('Sticky routing requires at least one trial key');
  }
  const sorted = [...trialKeys].sort();
  return sorted[stickyBucket(subjectId, selectorName, sorted.length)];
}
