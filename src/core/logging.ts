/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogLevel = 'info' | 'warn' | 'error';

/**
 * Unified console logger with structured, multiline output.
 * Each non-empty field is printed on its own line for readability.
 */
export const logConsole = (
  level: LogLevel,
  label: string,
  fields: Array<[string, string | number | undefined | null]> = [],
): void => {
  const filtered: Array<[string, string | number]> = [];
  for (const [key, value] of fields) {
    if (value !== undefined && value !== null && value !== '') {
      filtered.push([key, value]);
    }
  }
  const width = filtered.reduce((max, [key]) => Math.max(max, key.length), 0);
  const lines: string[] = [`[log-extractor] ${label}:`];
  for (const [key, value] of filtered) {
    lines.push(`  ${key.padEnd(width)} = ${value}`);
  }
  const output = lines.join('\n');
  if (level === 'warn') {
    console.warn(output);
  } else if (level === 'error') {
    console.error(output);
  } else {
    console.log(output);
  }
};
