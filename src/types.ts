// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Tool and provider shapes shared across modules.
 */

/**
 * A tool as described to callers: name, purpose and JSON-schema input.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

/**
 * One invocation of a registered tool.
 */
export interface ToolCall {
  /** Echoed back as `tool_use_id` */
  id: string;
  name: string;
  input: Record<string, unknown>;
}

/**
 * What a tool invocation produced. Failures carry the message in `content`.
 */
export interface ToolResult {
  tool_use_id: string;
  content: string;
  is_error?: boolean;
}

/**
 * Connection and sampling settings for a text generation backend.
 */
export interface ProviderConfig {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
}
