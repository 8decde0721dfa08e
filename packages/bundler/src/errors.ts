import type { BundleStage } from './types.js';

export class BundleConfigError extends Error {
  constructor(
    message: string,
    readonly issues: readonly string[],
  ) {
    super(message);
    this.name = 'BundleConfigError';
  }
}

/**
 * Filesystem failure inside one pipeline stage. The underlying error is kept
 * as `cause`.
 */
export class BundleStageError extends Error {
  constructor(
    message: string,
    readonly stage: BundleStage,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'BundleStageError';
  }
}

export interface ToolchainErrorDetails {
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly attempts: number;
  readonly transient: boolean;
}

export class ToolchainError extends Error {
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly attempts: number;
  readonly transient: boolean;

  constructor(
    message: string,
    details: ToolchainErrorDetails,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ToolchainError';
    this.exitCode = details.exitCode;
    this.stdout = details.stdout;
    this.stderr = details.stderr;
    this.attempts = details.attempts;
    this.transient = details.transient;
  }
}

export class StylesheetCompileError extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StylesheetCompileError';
  }
}

export class TemplateRenderError extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TemplateRenderError';
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
