// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { BaseProvider } from './base.js';
import { AnthropicProvider } from './anthropic.js';
import { OllamaProvider } from './ollama.js';
import type { ProviderConfig } from '../types.js';

export { BaseProvider, DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from './base.js';
export { AnthropicProvider, extractText } from './anthropic.js';
export { OllamaProvider, parseGenerateResponse } from './ollama.js';

export type ProviderBackend = 'anthropic' | 'ollama';

export interface ModelProfile {
  backend: ProviderBackend;
  model: string;
}

/** Named model profiles selectable with --model and /model */
export const MODEL_PROFILES = {
  haiku: { backend: 'anthropic', model: 'claude-3-5-haiku-20241022' },
  llama: { backend: 'ollama', model: 'llama3.2:1b' },
} as const satisfies Record<string, ModelProfile>;

export type ModelProfileName = keyof typeof MODEL_PROFILES;

export const DEFAULT_MODEL_PROFILE: ModelProfileName = 'haiku';

export function isModelProfileName(name: string): name is ModelProfileName {
  return Object.prototype.hasOwnProperty.call(MODEL_PROFILES, name);
}

/**
 * Profile names, sorted.
 */
export function getProfileNames(): ModelProfileName[] {
  return Object.keys(MODEL_PROFILES).filter(isModelProfileName).sort();
}

export interface ProviderConnections {
  anthropicApiKey?: string;
  ollamaBaseUrl?: string;
}

/**
 * Create the provider behind a model profile.
 */
export function createProvider(profileName: ModelProfileName, connections: ProviderConnections = {}): BaseProvider {
  const profile: ModelProfile = MODEL_PROFILES[profileName];
  const config: ProviderConfig = { model: profile.model };

  switch (profile.backend) {
    case 'anthropic':
      return new AnthropicProvider({ ...config, apiKey: connections.anthropicApiKey });
    case 'ollama':
      return new OllamaProvider({ ...config, baseUrl: connections.ollamaBaseUrl });
  }
}
