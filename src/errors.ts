// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Error types shared by the retrieval subsystem and the model providers.
 */

/**
 * The embedding service could not be reached or answered with something
 * that is not a JSON document (network failure, timeout, non-2xx status).
 */
export class EmbeddingTransportError extends Error {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'EmbeddingTransportError';
  }
}

/**
 * The persisted index file exists but does not hold an array of chunk records.
 */
export class IndexFormatError extends Error {
  constructor(
    message: string,
    public readonly indexPath: string
  ) {
    super(message);
    this.name = 'IndexFormatError';
  }
}

/**
 * The workspace root is missing or is not a directory.
 */
export class WorkspaceNotFoundError extends Error {
  constructor(public readonly workspaceRoot: string) {
    super(`Workspace not found: ${workspaceRoot}`);
    this.name = 'WorkspaceNotFoundError';
  }
}

/**
 * A language model backend failed to produce text.
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: string
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/**
 * Render any thrown value as a one-line message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
