/**
 * SandboxError
 * Failure classes raised by the lifecycle core and mapped to exit codes by the CLI
 */

import { ExitCode } from '../types/exit-codes';
import { isCloudGatewayError } from '../types/cloud-gateway';
import { PrompterError } from '../types/prompter';

export type SandboxErrorCode =
  | 'CONFIGURATION'
  | 'RESOURCE_CREATION'
  | 'INVARIANT_VIOLATION'
  | 'TEARDOWN'
  | 'OPERATOR_CANCELLED';

export interface SandboxErrorOptions {
  /** Gateway operation that failed */
  operation?: string;
  /** Id or name of the resource involved */
  resourceId?: string;
  cause?: unknown;
}

export class SandboxError extends Error {
  readonly code: SandboxErrorCode;
  readonly operation?: string;
  readonly resourceId?: string;

  constructor(code: SandboxErrorCode, message: string, options: SandboxErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'SandboxError';
    this.code = code;
    this.operation = options.operation;
    this.resourceId = options.resourceId;
  }
}

export function isSandboxError(error: unknown): error is SandboxError {
  return error instanceof SandboxError;
}

/**
 * Wrap a gateway failure, keeping the operation and resource it names
 */
export function fromGatewayFailure(
  code: 'CONFIGURATION' | 'RESOURCE_CREATION' | 'TEARDOWN',
  error: unknown,
  fallback: { operation: string; resourceId?: string }
): SandboxError {
  if (isSandboxError(error)) {
    return error;
  }
  if (isCloudGatewayError(error)) {
    const resourceId = error.resourceId ?? fallback.resourceId;
    const target = resourceId ? ` (${resourceId})` : '';
    return new SandboxError(code, `${error.operation} failed${target}: ${error.message}`, {
      operation: error.operation,
      resourceId,
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new SandboxError(code, `${fallback.operation} failed: ${message}`, {
    operation: fallback.operation,
    resourceId: fallback.resourceId,
    cause: error,
  });
}

/**
 * Convert an unanswered prompt into a cancellation
 */
export function fromPrompterError(error: PrompterError, question: string): SandboxError {
  return new SandboxError('OPERATOR_CANCELLED', `${question}: ${error.message}`, {
    operation: 'prompt',
    cause: error.cause,
  });
}

/**
 * Exit code for a failure escaping the run
 */
export function getExitCodeForError(error: unknown): ExitCode {
  if (!isSandboxError(error)) {
    return ExitCode.UNEXPECTED_ERROR;
  }
  switch (error.code) {
    case 'CONFIGURATION':
      return ExitCode.CONFIGURATION_ERROR;
    case 'RESOURCE_CREATION':
    case 'TEARDOWN':
      return ExitCode.CLOUD_ERROR;
    case 'INVARIANT_VIOLATION':
      return ExitCode.INVARIANT_VIOLATION;
    case 'OPERATOR_CANCELLED':
      return ExitCode.OPERATOR_CANCELLED;
  }
}
