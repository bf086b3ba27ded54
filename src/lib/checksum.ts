// SHA-256 verification of the downloaded archive

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { ChecksumMismatchError, InstallIOError, describeError } from './install-errors.js';
import logger from './logger.js';

export async function sha256File(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  try {
    for await (const chunk of createReadStream(filePath)) {
      hash.update(chunk);
    }
  } catch (err) {
    throw new InstallIOError(`Could not read ${filePath}: ${describeError(err)}`, { cause: err });
  }
  return hash.digest('hex');
}

/**
 * Compare the file's digest with the expected one, ignoring case.
 * Without an expected digest this is a no-op: verification is opt-in.
 */
export async function verifyChecksum(filePath: string, expected?: string): Promise<boolean> {
  if (!expected) {
    logger.info('No checksum configured, skipping verification');
    return false;
  }

  const actual = await sha256File(filePath);
  if (actual.toLowerCase() !== expected.trim().toLowerCase()) {
    throw new ChecksumMismatchError(expected, actual);
  }

  logger.info(`Checksum verified: ${actual}`);
  return true;
}
