/**
 * ErrorPresenter - pure presentation layer for EngineError instances
 * - No business logic; formats into environment-specific view objects
 */

import { ErrorCode } from './codes.js';
import {
  formatLocation,
  type EngineError,
  type SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

const WORKAROUNDS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.MALFORMED_UNCERTAINTY]:
    'Check the uncertainty value against the branch set type',
  [ErrorCode.COLLAPSE_NOT_SUPPORTED]:
    'Disable collapsing on the branch set or restrict it with applyToSources',
  [ErrorCode.BRANCH_NOT_FOUND]:
    'List the branch ids of each level with the values command',
  [ErrorCode.PATH_NOT_CONSUMED]:
    'Shorten the path or use --path-policy lenient',
  [ErrorCode.CONFIGURATION_ERROR]: 'Check the option value and its range',
};

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: EngineError): CLIErrorView {
    const location = formatLocation(error.context);
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: location ? `Location: ${location}` : undefined,
      workaround: this.#formatWorkaround(error),
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout.columns || 80,
    };
  }

  formatForProduction(error: EngineError): SerializedError {
    return error.toJSON('prod');
  }

  #formatTitle(error: EngineError): string {
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatWorkaround(error: EngineError): string | undefined {
    return error.context?.suggestion ?? WORKAROUNDS[error.errorCode];
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }
}
