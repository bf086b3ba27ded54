// Zip extraction of the release archive

import AdmZip from 'adm-zip';
import { mkdir, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { EXECUTABLE_NAME } from './config-constants.js';
import { InstallIOError, MissingExecutableError, describeError } from './install-errors.js';
import logger from './logger.js';

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Unpack the archive into a fresh destination directory and return the path of the executable.
 * Anything already at destination is removed first.
 */
export async function extractArchive(
  archivePath: string,
  destinationPath: string,
  executableName: string = EXECUTABLE_NAME
): Promise<string> {
  try {
    await rm(destinationPath, { recursive: true, force: true });
    await mkdir(destinationPath, { recursive: true });
  } catch (err) {
    throw new InstallIOError(`Could not prepare ${destinationPath}: ${describeError(err)}`, { cause: err });
  }

  try {
    const zip = new AdmZip(archivePath);
    zip.extractAllTo(destinationPath, true);
    logger.debug(`Extracted ${zip.getEntries().length} entries to ${destinationPath}`);
  } catch (err) {
    throw new InstallIOError(`Could not extract ${archivePath}: ${describeError(err)}`, { cause: err });
  }

  const executablePath = join(destinationPath, executableName);
  if (!(await isFile(executablePath))) {
    throw new MissingExecutableError(executableName);
  }
  return executablePath;
}
