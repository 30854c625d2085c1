/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './core/index.js';
export * from './runner/index.js';
export * from './tools/index.js';
export { formatTable, renderTableToConsole, ResultTableView } from './ui/result-table.js';
export { main as runCli, type CliOutcome } from './cli/main.js';
