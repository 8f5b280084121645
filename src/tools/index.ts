// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { ToolRegistry } from './registry.js';
import { SearchCodebaseTool } from './search-codebase.js';
import { FormatResponseTool } from './format-response.js';
import type { EvidenceDependencies } from '../evidence/aggregator.js';

export { BaseTool, requireString, optionalString, optionalStringList } from './base.js';
export { ToolRegistry } from './registry.js';
export { SearchCodebaseTool, searchCodebase } from './search-codebase.js';
export type { SearchCodebaseInput } from './search-codebase.js';
export { FormatResponseTool, formatResponse } from './format-response.js';

/**
 * Registry holding the assistant's tools.
 */
export function createToolRegistry(deps: EvidenceDependencies = {}): ToolRegistry {
  const registry = new ToolRegistry();
  registry.registerAll([new SearchCodebaseTool(deps), new FormatResponseTool()]);
  return registry;
}
