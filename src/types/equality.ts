import type { Line } from './line.js';

export interface LineFilter {
  pattern: string;
  label?: string;
  enabled?: boolean;
}

export interface EqualityPolicy {
  ignoreCase: boolean;
  ignoreAllWhitespace: boolean;
  ignoreWhitespaceChange: boolean;
  ignoreEol: boolean;
  ignoreBlankLines: boolean;
  filters: LineFilter[];
}

export interface LineNormalizer {
  readonly policy: EqualityPolicy;
  key(line: Line): string;
  equal(a: Line, b: Line): boolean;
  isBlank(line: Line): boolean;
}
