/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export { readLogLines, splitLines, ensureDirectory, LOG_ENCODING, type ReadLogOptions } from './files.js';
export {
  writeCsvReport,
  serializeCsv,
  parseCsv,
  formatCsvValue,
  DEFAULT_DELIMITER,
  type ReportOptions,
  type ParsedCsv,
} from './report-writer.js';
