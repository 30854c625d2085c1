/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';

export const LOG_ENCODING = 'utf-8';

export interface ReadLogOptions {
  limit?: number;
}

/**
 * Splits decoded text on any line terminator. A terminator at the very end
 * does not open another line.
 */
export const splitLines = (text: string): string[] => {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split(/\r\n|\n|\r/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
};

/**
 * Reads the whole file as UTF-8. Invalid byte sequences raise a TypeError
 * instead of decoding to U+FFFD.
 */
export const readLogLines = async (
  filePath: string,
  options: ReadLogOptions = {},
): Promise<string[]> => {
  const raw = await fs.readFile(filePath);
  const text = new TextDecoder(LOG_ENCODING, { fatal: true }).decode(raw);
  const lines = splitLines(text);
  if (typeof options.limit === 'number' && options.limit > 0) {
    return lines.slice(0, options.limit);
  }
  return lines;
};

export const ensureDirectory = async (dirPath: string): Promise<void> => {
  await fs.mkdir(dirPath, { recursive: true });
};
