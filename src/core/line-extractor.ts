/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ExtractionRule, ExtractorConfig, LogRecord } from './types.js';

const firstMatch = (rule: ExtractionRule, line: string): string | null => {
  // Rules are compiled without g or y, so exec always starts at index 0.
  const match = rule.regex.exec(line);
  if (!match) {
    return null;
  }
  return match[rule.group] ?? null;
};

/**
 * Applies every active rule to one line. Rules never short-circuit each other.
 */
export const extractLine = (line: string, config: ExtractorConfig): LogRecord => {
  const record: LogRecord = { log_entry: line.trim() };
  for (const rule of config.rules) {
    record[rule.column] = firstMatch(rule, line);
  }
  return record;
};
