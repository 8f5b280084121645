// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Module
 *
 * - types.ts  - Type definitions
 * - env.ts    - Environment variables, read once at the CLI boundary
 * - loader.ts - Per-workspace RAG settings (config/memory.yaml)
 */

export type { EnvironmentConfig } from './types.js';

export {
  resolveEnvironmentConfig,
  normalizeOllamaBaseUrl,
  parseTimeoutSeconds,
} from './env.js';

export { RAG_PROFILE_ID, loadRagSettings, ragSettingsFromDocument } from './loader.js';
