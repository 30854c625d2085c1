/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type ExtractorErrorKind = 'configuration' | 'source-not-found' | 'unexpected-processing';

export class ExtractorError extends Error {
  readonly kind: ExtractorErrorKind;

  constructor(kind: ExtractorErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractorError';
    this.kind = kind;
  }
}

const UNREADABLE_SOURCE_CODES = new Set(['ENOENT', 'EACCES', 'EISDIR', 'ENOTDIR', 'EPERM']);

const errnoCode = (error: unknown): string | undefined => {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
};

/**
 * Maps anything thrown while reading or extracting onto one of the known
 * error kinds.
 */
export const toExtractorError = (error: unknown, sourcePath: string): ExtractorError => {
  if (error instanceof ExtractorError) {
    return error;
  }
  const code = errnoCode(error);
  if (code && UNREADABLE_SOURCE_CODES.has(code)) {
    return new ExtractorError('source-not-found', `Log file not found: ${sourcePath}`, {
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ExtractorError(
    'unexpected-processing',
    `An error occurred during log analysis: ${message}`,
    { cause: error },
  );
};
