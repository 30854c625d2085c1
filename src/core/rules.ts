/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ExtractorError } from './errors.js';
import {
  COLUMN_ORDER,
  type ColumnName,
  type ErrorCodeRule,
  type ExtractionRule,
  type ExtractorConfig,
  type Ipv4Rule,
  type PatternRule,
  type RuleSelection,
  type UserAgentRule,
} from './types.js';

const OCTET = '(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)';

// Word boundaries and digits follow Unicode categories, not just ASCII.
const WORD_CHAR = '[\\p{L}\\p{N}_]';

export const IPV4_PATTERN = new RegExp(
  `(?<!${WORD_CHAR})(?:${OCTET}\\.){3}${OCTET}(?!${WORD_CHAR})`,
  'u',
);
export const ERROR_CODE_PATTERN = /ERROR\s+(\p{Nd}+)/u;
export const USER_AGENT_PATTERN = /User-Agent:\s*(.+)/;

export const createPatternRule = (pattern: string): PatternRule => {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ExtractorError('configuration', `Invalid regex pattern: ${message}`, {
      cause: error,
    });
  }
  return { kind: 'pattern', column: 'pattern_match', regex, group: 0 };
};

export const ipv4Rule: Ipv4Rule = {
  kind: 'ipv4',
  column: 'ip_address',
  regex: IPV4_PATTERN,
  group: 0,
};

export const errorCodeRule: ErrorCodeRule = {
  kind: 'error-code',
  column: 'error_code',
  regex: ERROR_CODE_PATTERN,
  group: 1,
};

export const userAgentRule: UserAgentRule = {
  kind: 'user-agent',
  column: 'user_agent',
  regex: USER_AGENT_PATTERN,
  group: 1,
};

/**
 * Compiles the selected rules once, before any line is read. The column set
 * of every table built from the returned config is fixed by this call.
 *
 * @throws ExtractorError of kind `configuration` when the custom pattern does
 * not compile.
 */
export const buildExtractorConfig = (selection: RuleSelection): ExtractorConfig => {
  const rules: ExtractionRule[] = [];
  if (selection.pattern !== undefined && selection.pattern !== '') {
    rules.push(createPatternRule(selection.pattern));
  }
  if (selection.ipAddress) {
    rules.push(ipv4Rule);
  }
  if (selection.errorCodes) {
    rules.push(errorCodeRule);
  }
  if (selection.userAgents) {
    rules.push(userAgentRule);
  }
  const active = new Set<ColumnName>(['log_entry', ...rules.map((rule) => rule.column)]);
  return {
    rules,
    columns: COLUMN_ORDER.filter((column) => active.has(column)),
  };
};
