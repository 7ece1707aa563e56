export const DIAGNOSTIC_CODES = {
  /** Path ids left over under the lenient path policy */
  LT_PATH_TRUNCATED: 'LT_PATH_TRUNCATED',
  /** Sources no branch set applied to, copied through unchanged */
  SOURCE_UNTOUCHED: 'SOURCE_UNTOUCHED',
} as const;

export type DiagnosticCode =
  (typeof DIAGNOSTIC_CODES)[keyof typeof DIAGNOSTIC_CODES];

export interface DiagnosticDetailsMap {
  LT_PATH_TRUNCATED: { consumed: string[]; unconsumed: string[] };
  SOURCE_UNTOUCHED: { count: number; sourceIds: string[] };
}

export interface Diagnostic<C extends DiagnosticCode = DiagnosticCode> {
  code: C;
  /** Branch ids leading to the branch set the note is about */
  bsetPath?: string[];
  details: DiagnosticDetailsMap[C];
}

export function makeDiagnostic<C extends DiagnosticCode>(
  code: C,
  details: DiagnosticDetailsMap[C],
  bsetPath?: string[]
): Diagnostic<C> {
  return bsetPath ? { code, bsetPath, details } : { code, details };
}
