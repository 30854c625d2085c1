/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React from 'react';
import { Box, Text, render } from 'ink';
import type { ResultTable } from '../core/index.js';

export const NULL_MARKER = '-';

/**
 * Lays the table out as aligned text: a right-aligned row index followed by
 * left-aligned columns, two spaces apart.
 */
export const formatTable = (table: ResultTable): string[] => {
  const indexCells = table.records.map((_record, index) => String(index));
  const columnCells = table.columns.map((column) =>
    table.records.map((record) => record[column] ?? NULL_MARKER),
  );
  const indexWidth = indexCells.reduce((max, cell) => Math.max(max, cell.length), 0);
  const widths = table.columns.map((column, position) =>
    (columnCells[position] ?? []).reduce((max, cell) => Math.max(max, cell.length), column.length),
  );

  const layout = (index: string, cells: readonly string[]): string =>
    [index.padStart(indexWidth), ...cells.map((cell, position) => cell.padEnd(widths[position] ?? 0))]
      .join('  ')
      .trimEnd();

  const lines = [layout('', table.columns)];
  indexCells.forEach((index, row) => {
    lines.push(layout(index, columnCells.map((cells) => cells[row] ?? NULL_MARKER)));
  });
  return lines;
};

export interface ResultTableViewProps {
  table: ResultTable;
}

export const ResultTableView: React.FC<ResultTableViewProps> = ({ table }) => {
  const [header, ...rows] = formatTable(table);
  const footer = `[${table.records.length} rows x ${table.columns.length} columns]`;
  // Sized to the widest line so ink never wraps a row at the terminal width.
  const width = [header ?? '', ...rows, footer].reduce((max, line) => Math.max(max, line.length), 0);
  return (
    <Box flexDirection="column" flexShrink={0} width={width}>
      <Text bold color="cyan">
        {header}
      </Text>
      {rows.map((line, index) => (
        <Text key={index}>{line}</Text>
      ))}
      <Text dimColor>{footer}</Text>
    </Box>
  );
};

export const renderTableToConsole = async (table: ResultTable): Promise<void> => {
  const { unmount, waitUntilExit } = render(<ResultTableView table={table} />);
  const exited = waitUntilExit();
  unmount();
  await exited;
};
