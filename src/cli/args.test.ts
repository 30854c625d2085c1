/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { ExtractorError } from '../core/index.js';
import { parseArgs, toRuleSelection, validateOptions } from './args.js';

describe('parseArgs', () => {
  it('reads the positional path and every option', () => {
    const options = parseArgs([
      'app.log',
      '-p',
      'fail\\w+',
      '-o',
      'out.csv',
      '-l',
      '5',
      '--ip_address',
      '--error_codes',
      '--user_agents',
    ]);
    expect(options).toEqual({
      logFile: 'app.log',
      pattern: 'fail\\w+',
      outputPath: 'out.csv',
      limit: 5,
      ipAddress: true,
      errorCodes: true,
      userAgents: true,
    });
    expect(toRuleSelection(options)).toEqual({
      pattern: 'fail\\w+',
      ipAddress: true,
      errorCodes: true,
      userAgents: true,
    });
  });

  it('accepts long option names', () => {
    expect(
      parseArgs(['--pattern', 'x', '--output', 'r.csv', '--limit', '2', '--delimiter', ';', 'a.log']),
    ).toEqual({
      logFile: 'a.log',
      pattern: 'x',
      outputPath: 'r.csv',
      limit: 2,
      delimiter: ';',
      ipAddress: false,
      errorCodes: false,
      userAgents: false,
    });
  });

  it('rejects unknown flags, missing values and extra positionals', () => {
    expect(() => parseArgs(['app.log', '--verbose'])).toThrow('Unknown argument: --verbose');
    expect(() => parseArgs(['app.log', '-o'])).toThrow('Missing value for -o.');
    expect(() => parseArgs(['a.log', 'b.log'])).toThrow('Unexpected argument: b.log');
    expect(() => parseArgs(['--verbose'])).toThrow(ExtractorError);
  });
});

describe('validateOptions', () => {
  it('accepts a complete set of options', () => {
    expect(() => validateOptions(parseArgs(['app.log', '-l', '10', '-d', ';']))).not.toThrow();
  });

  it('requires a log file path', () => {
    expect(() => validateOptions(parseArgs(['--ip_address']))).toThrow(
      'Invalid log file path. Please provide a path.',
    );
  });

  it('rejects an empty output path', () => {
    expect(() => validateOptions(parseArgs(['app.log', '-o', ' ']))).toThrow(
      'Invalid output file path. Please provide a path.',
    );
  });

  it('accepts signed and space-padded decimal limits', () => {
    expect(parseArgs(['app.log', '-l', ' 4 ']).limit).toBe(4);
    expect(parseArgs(['app.log', '-l', '+3']).limit).toBe(3);
  });

  it.each(['0', '-1', '2.5', 'abc', '', '0x10', '1e2', '3.0', '0b11'])('rejects limit %j', (limit) => {
    expect(() => validateOptions(parseArgs(['app.log', '--limit', limit]))).toThrow(
      'Invalid limit value. Please provide a positive integer.',
    );
  });

  it('rejects delimiters that are not a single safe character', () => {
    expect(() => validateOptions(parseArgs(['app.log', '-d', ';;']))).toThrow(
      'Invalid delimiter. Please provide one character.',
    );
    expect(() => validateOptions(parseArgs(['app.log', '-d', '"']))).toThrow(
      'Invalid delimiter. Quotes and line breaks are reserved.',
    );
  });
});
