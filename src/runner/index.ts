/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  analyzeLogFile,
  emitTable,
  type AnalyzeOptions,
  type AnalysisResult,
  type EmitOptions,
  type EmitOutcome,
} from './batch-runner.js';
