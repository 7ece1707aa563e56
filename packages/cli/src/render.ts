import type { CLIErrorView } from '@faultbranch/core';

const ANSI = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  bold: '\u001B[1m',
  dim: '\u001B[2m',
};

// Continuation lines line up under the text that follows a section's icon
const CONTINUATION_INDENT = '   ';

function colorize(text: string, useColor: boolean, color: string): string {
  if (!useColor) return text;
  return `${color}${text}${ANSI.reset}`;
}

function wrapText(text: string, width: number, indent = ''): string {
  if (!text) return '';
  const lines: string[] = [];
  let line = '';
  for (const word of text.split(/\s+/)) {
    const candidate = line ? `${line} ${word}` : word;
    const prefix = lines.length > 0 ? indent : '';
    if (line && prefix.length + candidate.length > width) {
      lines.push(prefix + line);
      line = word;
    } else {
      line = candidate;
    }
  }
  if (line) lines.push((lines.length > 0 ? indent : '') + line);
  return lines.join('\n');
}

/**
 * Multi-line terminal rendering of an error view: a red title, the document
 * location when known, then the suggested workaround
 */
export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const lines = [
    colorize(
      colorize(`❌ ${view.title}`, view.colors, ANSI.bold),
      view.colors,
      ANSI.red
    ),
  ];

  if (view.location) {
    lines.push(
      colorize(
        wrapText(`📍 ${view.location}`, width, CONTINUATION_INDENT),
        view.colors,
        ANSI.dim
      )
    );
  }
  if (view.workaround) {
    lines.push(
      wrapText(`💡 Workaround: ${view.workaround}`, width, CONTINUATION_INDENT)
    );
  }

  return lines.join('\n');
}

export function stripAnsi(input: string): string {
  // CSI sequences only; the renderer emits nothing else
  // eslint-disable-next-line no-control-regex
  return input.replace(/\u001B\[[\d;]*m/g, '');
}

export default renderCLIView;
