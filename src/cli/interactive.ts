/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import prompts from 'prompts';
import type { RunnerOptions } from './args.js';

/**
 * Fills the options from prompts. Resolves to false when the user cancels;
 * the options are then left as they were.
 */
export async function runInteractiveSetup(options: RunnerOptions): Promise<boolean> {
  let cancelled = false;
  const responses = await prompts(
    [
      {
        type: 'text',
        name: 'logFile',
        message: 'Path to the log file to analyze',
        initial: options.logFile,
      },
      {
        type: 'text',
        name: 'pattern',
        message: 'Regex pattern to search for (leave empty to skip)',
        initial: options.pattern ?? '',
      },
      {
        type: 'text',
        name: 'outputPath',
        message: 'Output CSV file (leave empty to print a table)',
        initial: options.outputPath ?? '',
      },
      {
        type: 'number',
        name: 'limit',
        message: 'Maximum number of log lines to process (leave empty for all)',
        initial: options.limit,
      },
      {
        type: 'toggle',
        name: 'ipAddress',
        message: 'Extract IP addresses?',
        initial: options.ipAddress,
        active: 'yes',
        inactive: 'no',
      },
      {
        type: 'toggle',
        name: 'errorCodes',
        message: 'Extract error codes?',
        initial: options.errorCodes,
        active: 'yes',
        inactive: 'no',
      },
      {
        type: 'toggle',
        name: 'userAgents',
        message: 'Extract User-Agent strings?',
        initial: options.userAgents,
        active: 'yes',
        inactive: 'no',
      },
    ],
    {
      onCancel: () => {
        cancelled = true;
        return false;
      },
    },
  );
  if (cancelled) {
    return false;
  }

  if (typeof responses.logFile === 'string' && responses.logFile.trim()) {
    options.logFile = responses.logFile.trim();
  }
  if (typeof responses.pattern === 'string' && responses.pattern) {
    options.pattern = responses.pattern;
  }
  if (typeof responses.outputPath === 'string' && responses.outputPath.trim()) {
    options.outputPath = responses.outputPath.trim();
  }
  if (typeof responses.limit === 'number' && !Number.isNaN(responses.limit)) {
    options.limit = responses.limit;
  }
  if (typeof responses.ipAddress === 'boolean') {
    options.ipAddress = responses.ipAddress;
  }
  if (typeof responses.errorCodes === 'boolean') {
    options.errorCodes = responses.errorCodes;
  }
  if (typeof responses.userAgents === 'boolean') {
    options.userAgents = responses.userAgents;
  }
  return true;
}
