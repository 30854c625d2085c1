/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  ExtractorError,
  extractLine,
  logConsole,
  toExtractorError,
  type ExtractorConfig,
  type ResultTable,
} from '../core/index.js';
import { readLogLines, writeCsvReport } from '../tools/index.js';
import { renderTableToConsole } from '../ui/result-table.js';

export interface AnalyzeOptions {
  limit?: number;
}

export interface AnalysisResult {
  table: ResultTable;
  failure?: ExtractorError;
}

export type EmitOutcome = 'written' | 'printed' | 'empty';

export interface EmitOptions {
  outputPath?: string;
  delimiter?: string;
  renderConsole?: (table: ResultTable) => Promise<void>;
}

const emptyTable = (config: ExtractorConfig): ResultTable => ({
  columns: config.columns,
  records: [],
});

const reportFailure = (failure: ExtractorError, sourcePath: string): void => {
  switch (failure.kind) {
    case 'source-not-found':
      logConsole('error', 'Log file not found', [['path', sourcePath]]);
      break;
    case 'unexpected-processing':
    case 'configuration': {
      const cause = failure.cause instanceof Error ? failure.cause.message : undefined;
      logConsole('error', 'An error occurred during log analysis', [
        ['path', sourcePath],
        ['reason', cause ?? failure.message],
      ]);
      break;
    }
  }
};

/**
 * Reads the source and extracts one record per line, in file order.
 * Never rejects: read and extraction failures are logged and come back as an
 * empty table with {@link AnalysisResult.failure} set.
 */
export async function analyzeLogFile(
  sourcePath: string,
  config: ExtractorConfig,
  options: AnalyzeOptions = {},
): Promise<AnalysisResult> {
  try {
    const lines = await readLogLines(sourcePath, { limit: options.limit });
    const records = lines.map((line) => extractLine(line, config));
    return { table: { columns: config.columns, records } };
  } catch (error) {
    const failure = toExtractorError(error, sourcePath);
    reportFailure(failure, sourcePath);
    return { table: emptyTable(config), failure };
  }
}

/**
 * Routes a table to a CSV file when an output path is given, otherwise to the
 * console. Empty tables are only reported.
 */
export async function emitTable(table: ResultTable, options: EmitOptions = {}): Promise<EmitOutcome> {
  if (table.records.length === 0) {
    logConsole('warn', 'No data to display/save', [
      ['hint', 'Check log file or parameters.'],
    ]);
    return 'empty';
  }
  if (options.outputPath) {
    await writeCsvReport(table, { filePath: options.outputPath, delimiter: options.delimiter });
    logConsole('info', 'Analysis results saved', [
      ['path', options.outputPath],
      ['rows', table.records.length],
    ]);
    return 'written';
  }
  const renderConsole = options.renderConsole ?? renderTableToConsole;
  await renderConsole(table);
  return 'printed';
}
