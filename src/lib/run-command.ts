import logger from './logger.js';
import { InstallError, describeError } from './install-errors.js';
import { InvalidOptionError } from '../commands/common/error.js';
import { error } from '../ui/index.js';

type Exit = (code: number) => never;

function errorCode(err: unknown): string {
  if (err instanceof InstallError) return err.code;
  if (err instanceof InvalidOptionError) return 'INVALID_OPTION';
  return 'UNCLASSIFIED';
}

/**
 * Single failure boundary: any error ends the run with a red message and exit code 1.
 */
export async function runCommand(
  fn: () => Promise<unknown>,
  exit: Exit = (code) => process.exit(code)
): Promise<void> {
  try {
    await fn();
    exit(0);
  } catch (err) {
    const message = describeError(err);
    error(`Installation failed: ${message}`);
    logger.error(`[${errorCode(err)}] ${message}`);
    if (err instanceof Error && err.stack) {
      logger.debug(err.stack);
    }
    exit(1);
  }
}
