/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types.js';
export * from './errors.js';
export * from './rules.js';
export { extractLine } from './line-extractor.js';
export { logConsole, type LogLevel } from './logging.js';
