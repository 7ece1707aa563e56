import { describe, it, expect } from 'vitest';
import { renderCLIView, stripAnsi } from './render.js';
import { ErrorCode, type CLIErrorView } from '@faultbranch/core';

describe('renderCLIView', () => {
  it('renders title and sections', () => {
    const view: CLIErrorView = {
      title: 'Error E010: expected single float value',
      code: ErrorCode.MALFORMED_UNCERTAINTY,
      location: 'Location: tree.json:7',
      workaround: 'Check the uncertainty value against the branch set type',
      colors: false,
      terminalWidth: 120,
    };

    expect(renderCLIView(view)).toBe(
      [
        '❌ Error E010: expected single float value',
        '📍 Location: tree.json:7',
        '💡 Workaround: Check the uncertainty value against the branch set type',
      ].join('\n')
    );
  });

  it('applies ANSI colors when enabled', () => {
    const view: CLIErrorView = {
      title: 'Error E999: Internal error',
      code: ErrorCode.INTERNAL_ERROR,
      colors: true,
      terminalWidth: 80,
    };
    const out = renderCLIView(view);
    expect(out).toBe(
      '\u001B[31m\u001B[1m❌ Error E999: Internal error\u001B[0m\u001B[0m'
    );
    expect(stripAnsi(out)).toBe('❌ Error E999: Internal error');
  });

  it('dims the location when colors are enabled', () => {
    const view: CLIErrorView = {
      title: 'Error E300: not found',
      code: ErrorCode.BRANCH_NOT_FOUND,
      location: 'Location: tree.json:4',
      colors: true,
      terminalWidth: 80,
    };
    const [, location] = renderCLIView(view).split('\n');
    expect(location).toBe('\u001B[2m📍 Location: tree.json:4\u001B[0m');
  });

  it('wraps content based on terminalWidth', () => {
    const view: CLIErrorView = {
      title: 'Error E301: path not consumed',
      code: ErrorCode.PATH_NOT_CONSUMED,
      workaround: 'Shorten the path or use --path-policy lenient',
      colors: false,
      terminalWidth: 30,
    };
    expect(renderCLIView(view)).toBe(
      [
        '❌ Error E301: path not consumed',
        '💡 Workaround: Shorten the',
        '   path or use --path-policy',
        '   lenient',
      ].join('\n')
    );
  });
});
