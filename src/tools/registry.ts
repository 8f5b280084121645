// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { ToolDefinition, ToolCall, ToolResult } from '../types.js';
import type { BaseTool } from './base.js';
import { logger } from '../logger.js';

/**
 * Name-keyed set of the assistant's tools. Names are unique and
 * definitions come back in registration order.
 */
export class ToolRegistry {
  private readonly byName = new Map<string, BaseTool>();

  register(tool: BaseTool): void {
    const name = tool.getName();
    if (this.byName.has(name)) {
      throw new Error(`Tool "${name}" is already registered`);
    }
    this.byName.set(name, tool);
  }

  registerAll(tools: readonly BaseTool[]): void {
    tools.forEach((tool) => this.register(tool));
  }

  get(name: string): BaseTool | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  listTools(): string[] {
    return [...this.byName.keys()];
  }

  getDefinitions(): ToolDefinition[] {
    return [...this.byName.values()].map((tool) => tool.getDefinition());
  }

  /**
   * Run one call. Unknown tools and thrown errors come back as error results.
   */
  async execute(call: ToolCall): Promise<ToolResult> {
    const tool = this.byName.get(call.name);
    if (!tool) {
      return { tool_use_id: call.id, content: `Error: Unknown tool "${call.name}"`, is_error: true };
    }

    const start = Date.now();
    const result = await tool.run(call.id, call.input);
    logger.debug(
      `Tool ${call.name} (${call.id}) ${result.is_error ? 'failed' : 'finished'} in ${Date.now() - start}ms`
    );
    return result;
  }
}
