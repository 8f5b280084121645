// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import Anthropic from '@anthropic-ai/sdk';
import { BaseProvider } from './base.js';
import type { ProviderConfig } from '../types.js';
import { ProviderError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';

const DEFAULT_MODEL = 'claude-3-5-haiku-20241022';

/**
 * Concatenate the text blocks of a message, ignoring other block types.
 */
export function extractText(content: ReadonlyArray<{ type: string; text?: string }>): string {
  return content
    .map((block) => (block.type === 'text' && typeof block.text === 'string' ? block.text : ''))
    .join('');
}

export class AnthropicProvider extends BaseProvider {
  private client: Anthropic;
  private model: string;

  constructor(config: ProviderConfig = {}) {
    super(config);
    this.client = new Anthropic({
      apiKey: config.apiKey,
      ...(config.timeoutMs !== undefined && { timeout: config.timeoutMs }),
    });
    this.model = config.model || DEFAULT_MODEL;
  }

  async generate(prompt: string): Promise<string> {
    logger.llmRequest(this.getName(), this.model, prompt);
    const start = Date.now();

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: this.temperature,
        messages: [{ role: 'user', content: prompt }],
      });
    } catch (error) {
      throw new ProviderError(`Anthropic request failed: ${errorMessage(error)}`, this.getName());
    }

    const text = extractText(response.content);
    logger.llmResponse(text.length, (Date.now() - start) / 1000);
    return text;
  }

  getName(): string {
    return 'Anthropic';
  }

  getModel(): string {
    return this.model;
  }
}
