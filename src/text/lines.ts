import type { Eol, Line } from '../types/line.js';

const LINE_BREAK = /\r\n|\r|\n/g;

export function splitLines(text: string): Line[] {
  const lines: Line[] = [];
  let start = 0;
  LINE_BREAK.lastIndex = 0;
  for (let match = LINE_BREAK.exec(text); match !== null; match = LINE_BREAK.exec(text)) {
    lines.push({ text: text.slice(start, match.index), eol: toEol(match[0]), origin: lines.length, modified: false });
    start = match.index + match[0].length;
  }
  if (start < text.length) {
    lines.push({ text: text.slice(start), eol: '', origin: lines.length, modified: false });
  }
  return lines;
}

export function joinLines(lines: readonly Line[]): string {
  let out = '';
  for (const line of lines) out += line.text + line.eol;
  return out;
}

/** Builds load-time lines from bare strings, each terminated by `eol`. */
export function linesFrom(texts: readonly string[], eol: Eol = '\n'): Line[] {
  return texts.map((text, origin) => ({ text, eol, origin, modified: false }));
}

export function textsOf(lines: readonly Line[]): string[] {
  return lines.map((line) => line.text);
}

/** Most frequent terminator in `lines`, `\n` when there is none. */
export function dominantEol(lines: readonly Line[]): Exclude<Eol, ''> {
  const counts = { '\n': 0, '\r\n': 0, '\r': 0 };
  for (const line of lines) {
    if (line.eol !== '') counts[line.eol] += 1;
  }
  if (counts['\r\n'] > counts['\n'] && counts['\r\n'] >= counts['\r']) return '\r\n';
  if (counts['\r'] > counts['\n']) return '\r';
  return '\n';
}

export function editedLine(text: string, eol: Eol): Line {
  return { text, eol, origin: null, modified: true };
}

/**
 * Re-terminates lines about to be inserted at `start` into `target` (after
 * `removed` lines are taken out) so only the final line of a pane may lack a
 * terminator.
 */
export function fitInserted(target: readonly Line[], start: number, removed: number, inserted: readonly Line[]): Line[] {
  const endsPane = start + removed >= target.length;
  const fallback = dominantEol(target);
  const lastRemoved = removed > 0 ? target[start + removed - 1] : undefined;
  return inserted.map((line, i) => {
    const isLast = endsPane && i === inserted.length - 1;
    if (isLast) {
      const eol = lastRemoved !== undefined && lastRemoved.eol === '' ? '' : line.eol;
      return eol === line.eol ? line : { ...line, eol };
    }
    return line.eol === '' ? { ...line, eol: fallback } : line;
  });
}

function toEol(value: string): Exclude<Eol, ''> {
  if (value === '\r\n') return '\r\n';
  if (value === '\r') return '\r';
  return '\n';
}
