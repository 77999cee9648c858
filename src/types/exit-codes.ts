/**
 * Standardized exit codes
 */

export const ExitCode = {
  /** Successful execution (including an operator-aborted deletion) */
  SUCCESS: 0,
  /** Unexpected/unhandled error */
  UNEXPECTED_ERROR: 1,
  /** Invalid CLI usage */
  USAGE_ERROR: 2,
  /** Configuration or caller identity could not be resolved */
  CONFIGURATION_ERROR: 3,
  /** A cloud call failed while creating or deleting resources */
  CLOUD_ERROR: 4,
  /** A local invariant was violated before any cluster call */
  INVARIANT_VIOLATION: 5,
  /** A prompt was cancelled or could not be answered */
  OPERATOR_CANCELLED: 6,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function getExitCodeDescription(code: ExitCode): string {
  switch (code) {
    case ExitCode.SUCCESS:
      return 'Successful execution';
    case ExitCode.UNEXPECTED_ERROR:
      return 'Unexpected or unhandled error';
    case ExitCode.USAGE_ERROR:
      return 'Invalid CLI usage';
    case ExitCode.CONFIGURATION_ERROR:
      return 'Configuration or identity resolution failed';
    case ExitCode.CLOUD_ERROR:
      return 'Cloud resource operation failed';
    case ExitCode.INVARIANT_VIOLATION:
      return 'Resource selection violates a cluster requirement';
    case ExitCode.OPERATOR_CANCELLED:
      return 'Prompt cancelled or unanswerable';
    default:
      return 'Unknown exit code';
  }
}
