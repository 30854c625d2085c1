/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type RuleColumn = 'pattern_match' | 'ip_address' | 'error_code' | 'user_agent';

export type ColumnName = 'log_entry' | RuleColumn;

/**
 * Output column order. The header of every table follows it, skipping the
 * columns whose rule is inactive.
 */
export const COLUMN_ORDER: readonly ColumnName[] = [
  'log_entry',
  'pattern_match',
  'ip_address',
  'error_code',
  'user_agent',
];

interface RuleBase<K extends string, C extends RuleColumn> {
  kind: K;
  column: C;
  regex: RegExp;
  /** Capture group stored in the record; 0 keeps the whole match. */
  group: number;
}

export type PatternRule = RuleBase<'pattern', 'pattern_match'>;
export type Ipv4Rule = RuleBase<'ipv4', 'ip_address'>;
export type ErrorCodeRule = RuleBase<'error-code', 'error_code'>;
export type UserAgentRule = RuleBase<'user-agent', 'user_agent'>;

export type ExtractionRule = PatternRule | Ipv4Rule | ErrorCodeRule | UserAgentRule;

export type ExtractionRuleKind = ExtractionRule['kind'];

export interface RuleSelection {
  pattern?: string;
  ipAddress?: boolean;
  errorCodes?: boolean;
  userAgents?: boolean;
}

export interface ExtractorConfig {
  rules: readonly ExtractionRule[];
  columns: readonly ColumnName[];
}

export interface LogRecord {
  log_entry: string;
  pattern_match?: string | null;
  ip_address?: string | null;
  error_code?: string | null;
  user_agent?: string | null;
}

export interface ResultTable {
  columns: readonly ColumnName[];
  records: LogRecord[];
}
