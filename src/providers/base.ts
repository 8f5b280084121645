// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { ProviderConfig } from '../types.js';

/** Completion length used by every backend */
export const DEFAULT_MAX_TOKENS = 1000;

/** Sampling temperature used by every backend */
export const DEFAULT_TEMPERATURE = 0.3;

/**
 * Abstract base class for text generation backends.
 * Implement this interface to add support for new model backends.
 */
export abstract class BaseProvider {
  protected config: ProviderConfig;

  constructor(config: ProviderConfig = {}) {
    this.config = config;
  }

  /**
   * Generate a completion for a single user prompt.
   * @throws ProviderError when the backend fails
   */
  abstract generate(prompt: string): Promise<string>;

  /**
   * Get the name of this provider for display purposes.
   */
  abstract getName(): string;

  /**
   * Get the current model being used.
   */
  abstract getModel(): string;

  protected get maxTokens(): number {
    return this.config.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  protected get temperature(): number {
    return this.config.temperature ?? DEFAULT_TEMPERATURE;
  }
}
