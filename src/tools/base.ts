// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { ToolDefinition, ToolResult } from '../types.js';

/**
 * Read a required string parameter.
 */
export function requireString(input: Record<string, unknown>, key: string): string {
  const value = input[key];
  if (typeof value !== 'string') {
    throw new Error(`${key} is required and must be a string`);
  }
  return value;
}

/**
 * Read an optional string parameter.
 */
export function optionalString(input: Record<string, unknown>, key: string): string | undefined {
  const value = input[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new Error(`${key} must be a string`);
  }
  return value;
}

/**
 * Read an optional list of strings. A single string is taken as a one-item list.
 */
export function optionalStringList(input: Record<string, unknown>, key: string): string[] | undefined {
  const value = input[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return [value];
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value;
  }
  throw new Error(`${key} must be a list of strings`);
}

/**
 * Abstract base class for tools.
 * Each tool can be called by the model or by the assistant directly.
 */
export abstract class BaseTool {
  /**
   * Get the tool definition: name, description and input schema.
   */
  abstract getDefinition(): ToolDefinition;

  /**
   * Execute the tool with the given input.
   * @returns The text sent back to the caller
   */
  abstract execute(input: Record<string, unknown>): Promise<string>;

  /**
   * Get the name of this tool.
   */
  getName(): string {
    return this.getDefinition().name;
  }

  /**
   * Wrap the execution result in a ToolResult object.
   */
  async run(toolUseId: string, input: Record<string, unknown>): Promise<ToolResult> {
    try {
      const result = await this.execute(input);
      return {
        tool_use_id: toolUseId,
        content: result,
        is_error: false,
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return {
        tool_use_id: toolUseId,
        content: `Error: ${errorMessage}`,
        is_error: true,
      };
    }
  }
}
