/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ExtractorError, type RuleSelection } from '../core/index.js';

export interface RunnerOptions {
  logFile: string;
  pattern?: string;
  outputPath?: string;
  limit?: number;
  delimiter?: string;
  ipAddress: boolean;
  errorCodes: boolean;
  userAgents: boolean;
  interactive?: boolean;
  help?: boolean;
}

export const USAGE = `Usage: log-extractor <log_file> [options]

Analyze log files for patterns and generate reports.

Options:
  -p, --pattern <regex>    Regex pattern to search for in the log file
  -o, --output <path>      Path to the output CSV file (console table when omitted)
  -l, --limit <n>          Limit the number of log entries to process
  -d, --delimiter <char>   CSV field delimiter (default ",")
      --ip_address         Extract IP addresses
      --error_codes        Extract error codes ("ERROR <digits>")
      --user_agents        Extract User-Agent strings
  -i, --interactive        Prompt for every option
  -h, --help               Show this help`;

const INTEGER_TEXT = /^\s*[+-]?\d+\s*$/;

/** Decimal integers only; anything else becomes NaN and fails validation. */
export const parseLimit = (value: string): number =>
  INTEGER_TEXT.test(value) ? Number.parseInt(value, 10) : Number.NaN;

const takeValue = (argv: string[], index: number, flag: string): string => {
  const value = argv[index];
  if (value === undefined) {
    throw new ExtractorError('configuration', `Missing value for ${flag}.`);
  }
  return value;
};

/**
 * Parses the command line. Values are taken as given; {@link validateOptions}
 * checks them once interactive setup had its chance to fill them in.
 */
export const parseArgs = (argv: string[]): RunnerOptions => {
  const options: RunnerOptions = {
    logFile: '',
    ipAddress: false,
    errorCodes: false,
    userAgents: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';
    switch (arg) {
      case '--pattern':
      case '-p':
        options.pattern = takeValue(argv, ++i, arg);
        break;
      case '--output':
      case '-o':
        options.outputPath = takeValue(argv, ++i, arg);
        break;
      case '--limit':
      case '-l':
        options.limit = parseLimit(takeValue(argv, ++i, arg));
        break;
      case '--delimiter':
      case '-d':
        options.delimiter = takeValue(argv, ++i, arg);
        break;
      case '--ip_address':
        options.ipAddress = true;
        break;
      case '--error_codes':
        options.errorCodes = true;
        break;
      case '--user_agents':
        options.userAgents = true;
        break;
      case '--interactive':
      case '-i':
        options.interactive = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new ExtractorError('configuration', `Unknown argument: ${arg}`);
        }
        if (options.logFile) {
          throw new ExtractorError('configuration', `Unexpected argument: ${arg}`);
        }
        options.logFile = arg;
    }
  }

  return options;
};

export const validateOptions = (options: RunnerOptions): void => {
  if (options.logFile.trim() === '') {
    throw new ExtractorError('configuration', 'Invalid log file path. Please provide a path.');
  }
  if (options.outputPath !== undefined && options.outputPath.trim() === '') {
    throw new ExtractorError('configuration', 'Invalid output file path. Please provide a path.');
  }
  if (options.limit !== undefined && !(Number.isInteger(options.limit) && options.limit > 0)) {
    throw new ExtractorError(
      'configuration',
      'Invalid limit value. Please provide a positive integer.',
    );
  }
  if (options.delimiter !== undefined && options.delimiter.length !== 1) {
    throw new ExtractorError('configuration', 'Invalid delimiter. Please provide one character.');
  }
  if (options.delimiter === '"' || options.delimiter === '\n' || options.delimiter === '\r') {
    throw new ExtractorError('configuration', 'Invalid delimiter. Quotes and line breaks are reserved.');
  }
};

export const toRuleSelection = (options: RunnerOptions): RuleSelection => ({
  pattern: options.pattern,
  ipAddress: options.ipAddress,
  errorCodes: options.errorCodes,
  userAgents: options.userAgents,
});
