import { afterEach, describe, expect, it, vi } from 'vitest';
import { ErrorPresenter } from '../presenter.js';
import { ErrorCode } from '../codes.js';
import {
  ContractViolationError,
  LogicTreeError,
  LogicTreePathError,
} from '../../types/errors.js';

describe('ErrorPresenter', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('formats a CLI view with title, location and workaround', () => {
    const presenter = new ErrorPresenter('dev', {
      colors: false,
      terminalWidth: 100,
    });
    const view = presenter.formatForCLI(
      new LogicTreeError(9, 'tree.json', 'expected single float value')
    );
    expect(view).toEqual({
      title:
        "Error E010: filename 'tree.json', line 9: expected single float value",
      code: ErrorCode.MALFORMED_UNCERTAINTY,
      location: 'Location: tree.json:9',
      workaround: 'Check the uncertainty value against the branch set type',
      colors: false,
      terminalWidth: 100,
    });
  });

  it('prefers a suggestion carried by the error', () => {
    const presenter = new ErrorPresenter('prod', { colors: false });
    const view = presenter.formatForCLI(
      new ContractViolationError('bad', { suggestion: 'fix the weights' })
    );
    expect(view.workaround).toBe('fix the weights');
    expect(view.location).toBeUndefined();
  });

  it('uses the per-code workaround otherwise', () => {
    const presenter = new ErrorPresenter('prod', { colors: false });
    const view = presenter.formatForCLI(new LogicTreePathError(['c1'], 'b2'));
    expect(view.workaround).toBe(
      'Shorten the path or use --path-policy lenient'
    );
  });

  it('honours NO_COLOR over the environment default', () => {
    vi.stubEnv('NO_COLOR', '1');
    vi.stubEnv('FORCE_COLOR', '');
    const view = new ErrorPresenter('dev').formatForCLI(
      new ContractViolationError('bad')
    );
    expect(view.colors).toBe(false);
  });

  it('produces the prod serialization', () => {
    const view = new ErrorPresenter('prod').formatForProduction(
      new ContractViolationError('bad', { value: 3 })
    );
    expect(view.stack).toBeUndefined();
    expect(view.context).toEqual({});
  });
});
