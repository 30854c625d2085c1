/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import type { ResultTable } from '../core/index.js';
import { ensureDirectory } from './files.js';

export interface ReportOptions {
  filePath: string;
  delimiter?: string;
}

export interface ParsedCsv {
  header: string[];
  rows: Array<Array<string | null>>;
}

export const DEFAULT_DELIMITER = ',';

export const formatCsvValue = (value: string | null | undefined, delimiter: string): string => {
  if (value === undefined || value === null) {
    return '';
  }
  if (value === '') {
    return '""';
  }
  const needsQuoting =
    value.includes(delimiter) || value.includes('\n') || value.includes('\r') || value.includes('"');
  if (!needsQuoting) {
    return value;
  }
  const escaped = value.replace(/"/g, '""');
  return `"${escaped}"`;
};

export const serializeCsv = (table: ResultTable, delimiter = DEFAULT_DELIMITER): string => {
  const header = table.columns.map((column) => formatCsvValue(column, delimiter)).join(delimiter);
  const rows = table.records.map((record) =>
    table.columns.map((column) => formatCsvValue(record[column], delimiter)).join(delimiter),
  );
  return [header, ...rows].map((line) => `${line}\n`).join('');
};

/**
 * Writes the table as CSV, replacing any existing file at the path.
 */
export const writeCsvReport = async (table: ResultTable, options: ReportOptions): Promise<void> => {
  const serialized = serializeCsv(table, options.delimiter ?? DEFAULT_DELIMITER);
  await ensureDirectory(dirname(options.filePath));
  await fs.writeFile(options.filePath, serialized, 'utf8');
};

/**
 * Reads text produced by {@link serializeCsv}. A bare empty field is `null`;
 * a quoted empty field is the empty string.
 */
export const parseCsv = (text: string, delimiter = DEFAULT_DELIMITER): ParsedCsv => {
  const records: Array<Array<string | null>> = [];
  let row: Array<string | null> = [];
  let field = '';
  let quoted = false;
  let inQuotes = false;

  const endField = (): void => {
    row.push(quoted || field.length > 0 ? field : null);
    field = '';
    quoted = false;
  };
  const endRow = (): void => {
    endField();
    records.push(row);
    row = [];
  };

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];
    if (inQuotes) {
      if (char === '"' && text[i + 1] === '"') {
        field += '"';
        i += 1;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        field += char;
      }
      continue;
    }
    if (char === '"') {
      inQuotes = true;
      quoted = true;
    } else if (char === delimiter) {
      endField();
    } else if (char === '\n') {
      endRow();
    } else if (char === '\r') {
      if (text[i + 1] === '\n') {
        i += 1;
      }
      endRow();
    } else {
      field += char;
    }
  }
  if (field.length > 0 || quoted || row.length > 0) {
    endRow();
  }

  const [header = [], ...rows] = records;
  return {
    header: header.map((value) => value ?? ''),
    rows,
  };
};
