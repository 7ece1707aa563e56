/**
 * Error Code Infrastructure
 * Stable error codes and exit code mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Uncertainty value errors (E001–E099)
  MALFORMED_UNCERTAINTY = 'E010',
  INVALID_GEOMETRY = 'E011',

  // Contract violations (E100–E199)
  CONTRACT_VIOLATION = 'E100',

  // Collapsing (E200–E299)
  COLLAPSE_NOT_SUPPORTED = 'E200',

  // Tree lookup (E300–E399)
  BRANCH_NOT_FOUND = 'E300',
  PATH_NOT_CONSUMED = 'E301',

  // Source modification (E400–E499)
  UNSUPPORTED_MODIFICATION = 'E400',
  INVALID_MODIFICATION = 'E401',

  // Configuration (E500–E599)
  CONFIGURATION_ERROR = 'E500',

  // Internal
  INTERNAL_ERROR = 'E999',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.MALFORMED_UNCERTAINTY]: 20,
  [ErrorCode.INVALID_GEOMETRY]: 21,
  [ErrorCode.CONTRACT_VIOLATION]: 30,
  [ErrorCode.COLLAPSE_NOT_SUPPORTED]: 40,
  [ErrorCode.BRANCH_NOT_FOUND]: 50,
  [ErrorCode.PATH_NOT_CONSUMED]: 51,
  [ErrorCode.UNSUPPORTED_MODIFICATION]: 60,
  [ErrorCode.INVALID_MODIFICATION]: 61,
  [ErrorCode.CONFIGURATION_ERROR]: 70,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
