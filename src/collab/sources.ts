import type { LoadedSource } from '../types/collaborators.js';
import { splitLines } from '../text/lines.js';

/** Wraps decoded text as a loader result; line terminators are kept per line. */
export function textSource(label: string, text: string, identity?: string): LoadedSource {
  const source: LoadedSource = { label, lines: splitLines(text) };
  if (identity !== undefined) source.identity = identity;
  return source;
}
