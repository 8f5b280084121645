// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Reads per-workspace RAG settings from config/memory.yaml.
 */

import * as fs from 'fs';
import yaml from 'js-yaml';
import { logger } from '../logger.js';
import { WorkspacePaths } from '../paths.js';
import { DEFAULT_RAG_SETTINGS, type RagSettings } from '../rag/types.js';

/** Profile id that carries the RAG settings */
export const RAG_PROFILE_ID = 'rag_profile';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extract RAG settings from a parsed memory.yaml document.
 * Returns null when a value is present but unusable.
 */
export function ragSettingsFromDocument(document: unknown): RagSettings | null {
  const memory = isRecord(document) ? document.memory : undefined;
  const profiles = isRecord(memory) ? memory.context_profiles : undefined;
  if (!Array.isArray(profiles)) {
    return { ...DEFAULT_RAG_SETTINGS };
  }

  const profile: unknown = profiles.find((p: unknown) => isRecord(p) && p.id === RAG_PROFILE_ID);
  if (!isRecord(profile)) {
    return { ...DEFAULT_RAG_SETTINGS };
  }

  const metadata = isRecord(profile.metadata) ? profile.metadata : {};
  const settings: RagSettings = { ...DEFAULT_RAG_SETTINGS };

  if (metadata.rag_enabled !== undefined && metadata.rag_enabled !== null) {
    if (typeof metadata.rag_enabled !== 'boolean') return null;
    settings.enabled = metadata.rag_enabled;
  }

  if (metadata.rag_top_k !== undefined && metadata.rag_top_k !== null) {
    const topK = typeof metadata.rag_top_k === 'string' ? Number(metadata.rag_top_k.trim()) : metadata.rag_top_k;
    if (typeof topK !== 'number' || !Number.isInteger(topK) || topK < 0) return null;
    settings.topK = topK;
  }

  return settings;
}

/**
 * Load the RAG settings for a workspace.
 * Missing or malformed configuration yields the defaults (enabled, topK 6).
 */
export function loadRagSettings(workspaceRoot: string): RagSettings {
  const configPath = WorkspacePaths.memoryConfig(workspaceRoot);
  if (!fs.existsSync(configPath)) {
    return { ...DEFAULT_RAG_SETTINGS };
  }

  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    const settings = ragSettingsFromDocument(yaml.load(content));
    if (!settings) {
      logger.warn(`Invalid ${RAG_PROFILE_ID} metadata in ${configPath}; using defaults`);
      return { ...DEFAULT_RAG_SETTINGS };
    }
    return settings;
  } catch (error) {
    logger.warn(`Failed to parse ${configPath}: ${error instanceof Error ? error.message : error}`);
    return { ...DEFAULT_RAG_SETTINGS };
  }
}
