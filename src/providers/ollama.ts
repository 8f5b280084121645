// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Ollama text generation over the native /api/generate endpoint.
 */

import { BaseProvider } from './base.js';
import type { ProviderConfig } from '../types.js';
import { ProviderError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { DEFAULT_OLLAMA_HOST } from '../rag/embeddings/ollama.js';

const DEFAULT_MODEL = 'llama3.2:1b';
const DEFAULT_TIMEOUT_MS = 120_000;

interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  stream: false;
  options: {
    temperature: number;
    num_predict: number;
  };
}

/**
 * Pull the generated text out of an /api/generate response body.
 */
export function parseGenerateResponse(data: unknown): string | null {
  if (typeof data !== 'object' || data === null || !('response' in data)) {
    return null;
  }
  return typeof data.response === 'string' ? data.response : null;
}

export class OllamaProvider extends BaseProvider {
  private baseUrl: string;
  private model: string;

  constructor(config: ProviderConfig = {}) {
    super(config);
    this.baseUrl = (config.baseUrl || DEFAULT_OLLAMA_HOST).replace(/\/+$/, '');
    this.model = config.model || DEFAULT_MODEL;
  }

  async generate(prompt: string): Promise<string> {
    logger.llmRequest(this.getName(), this.model, prompt);
    const start = Date.now();

    const requestBody: OllamaGenerateRequest = {
      model: this.model,
      prompt,
      stream: false,
      options: {
        temperature: this.temperature,
        num_predict: this.maxTokens,
      },
    };

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(requestBody),
        signal: AbortSignal.timeout(this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      });
    } catch (error) {
      throw new ProviderError(`Ollama request to ${this.baseUrl} failed: ${errorMessage(error)}`, this.getName());
    }

    if (!response.ok) {
      throw new ProviderError(`Ollama API request failed: ${response.status} ${response.statusText}`, this.getName());
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new ProviderError(`Ollama returned invalid JSON: ${errorMessage(error)}`, this.getName());
    }

    const text = parseGenerateResponse(data);
    if (text === null) {
      throw new ProviderError('Ollama response did not include generated text', this.getName());
    }
    logger.llmResponse(text.length, (Date.now() - start) / 1000);
    return text;
  }

  getName(): string {
    return 'Ollama';
  }

  getModel(): string {
    return this.model;
  }
}
