/*
 * SonarQube CLI
 * Copyright (C) 2026 SonarSource Sàrl
 * mailto:info AT sonarsource DOT com
 *
 * This program is free software; you can redistribute it and/or
 * modify it under the terms of the GNU Lesser General Public
 * License as published by the Free Software Foundation; either
 * version 3 of the License, or (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the GNU
 * Lesser General Public License for more details.
 *
 * You should have received a copy of the GNU Lesser General Public License
 * along with this program; if not, write to the Free Software Foundation,
 * Inc., 51 Franklin Street, Fifth Floor, Boston, MA  02110-1301, USA.
 */

export type InstallErrorCode =
  | 'ASSET_NOT_FOUND'
  | 'DOWNLOAD_ERROR'
  | 'CHECKSUM_MISMATCH'
  | 'MISSING_EXECUTABLE'
  | 'IO_ERROR'
  | 'UNSUPPORTED_PLATFORM';

/**
 * Base class for every failure the installer classifies.
 * Anything else reaching the command boundary is reported with its own message.
 */
export class InstallError extends Error {
  readonly code: InstallErrorCode;

  constructor(code: InstallErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InstallError';
    this.code = code;
  }
}

/**
 * Thrown when a release does not carry the expected archive.
 */
export class AssetNotFoundError extends InstallError {
  readonly assetName: string;
  readonly tag: string;

  constructor(assetName: string, tag: string) {
    super('ASSET_NOT_FOUND', `Release ${tag} has no asset named ${assetName}`);
    this.name = 'AssetNotFoundError';
    this.assetName = assetName;
    this.tag = tag;
  }
}

/**
 * Thrown on any transport failure or non-success HTTP status.
 */
export class DownloadError extends InstallError {
  readonly status?: number;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super('DOWNLOAD_ERROR', message, options);
    this.name = 'DownloadError';
    this.status = options?.status;
  }
}

export class ChecksumMismatchError extends InstallError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string) {
    super('CHECKSUM_MISMATCH', `Checksum mismatch: expected ${expected}, got ${actual}`);
    this.name = 'ChecksumMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class MissingExecutableError extends InstallError {
  readonly executableName: string;

  constructor(executableName: string) {
    super('MISSING_EXECUTABLE', `Archive does not contain ${executableName}`);
    this.name = 'MissingExecutableError';
    this.executableName = executableName;
  }
}

/**
 * Thrown when a filesystem or process operation fails (directory creation, copy, PATH store).
 */
export class InstallIOError extends InstallError {
  constructor(message: string, options?: ErrorOptions) {
    super('IO_ERROR', message, options);
    this.name = 'InstallIOError';
  }
}

export class UnsupportedPlatformError extends InstallError {
  constructor(message: string) {
    super('UNSUPPORTED_PLATFORM', message);
    this.name = 'UnsupportedPlatformError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
