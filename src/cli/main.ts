/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  ExtractorError,
  buildExtractorConfig,
  logConsole,
  type ResultTable,
} from '../core/index.js';
import { analyzeLogFile, emitTable, type EmitOutcome } from '../runner/index.js';
import { USAGE, parseArgs, toRuleSelection, validateOptions } from './args.js';
import { runInteractiveSetup } from './interactive.js';

export type CliOutcome = EmitOutcome | 'invalid' | 'failed' | 'help';

export interface CliDependencies {
  renderConsole?: (table: ResultTable) => Promise<void>;
}

/**
 * Orchestrates one run. Every documented failure is logged and reported
 * through the returned outcome; none of them rejects.
 */
export const main = async (
  argv: string[] = process.argv.slice(2),
  deps: CliDependencies = {},
): Promise<CliOutcome> => {
  try {
    const options = parseArgs(argv);
    if (options.help) {
      console.log(USAGE);
      return 'help';
    }
    if (options.interactive && !(await runInteractiveSetup(options))) {
      logConsole('warn', 'Interactive setup cancelled');
      return 'invalid';
    }
    validateOptions(options);
    const config = buildExtractorConfig(toRuleSelection(options));

    const { table, failure } = await analyzeLogFile(options.logFile, config, {
      limit: options.limit,
    });
    const outcome = await emitTable(table, {
      outputPath: options.outputPath,
      delimiter: options.delimiter,
      renderConsole: deps.renderConsole,
    });
    return failure ? 'failed' : outcome;
  } catch (error) {
    if (error instanceof ExtractorError && error.kind === 'configuration') {
      logConsole('error', 'Invalid arguments', [
        ['reason', error.message],
        ['usage', 'log-extractor --help'],
      ]);
      return 'invalid';
    }
    const message = error instanceof Error ? error.message : String(error);
    logConsole('error', 'An unexpected error occurred', [['reason', message]]);
    return 'failed';
  }
};
