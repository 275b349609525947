import { createHash, randomBytes } from 'crypto';

/**
 * `exp-<base36 timestamp>-<8 hex>`; the hex part hashes the repository,
 * the timestamp and a random nonce, so ids sort by creation time.
 */
export function newRecordId(repoFullname: string, now: Date = new Date(), nonce?: string): string {
  const salt = nonce ?? randomBytes(8).toString('hex');
  const digest = createHash('sha256')
    .update(`${repoFullname}${now.toISOString()}${salt}`)
    .digest('hex')
    .slice(0, 8);
  return `exp-${now.getTime().toString(36)}-${digest}`;
}
