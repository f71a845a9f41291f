import type { EqualityPolicy, LineFilter, LineNormalizer } from '../types/equality.js';
import type { Line } from '../types/line.js';
import type { Result } from '../types/error.js';
import { ErrorCode } from '../types/enums.js';
import { fail, ok } from '../utils/errors.js';
import { compileFilter } from './compileFilter.js';
import type { CompiledFilter } from './compileFilter.js';

export const DEFAULT_EQUALITY: EqualityPolicy = {
  ignoreCase: false,
  ignoreAllWhitespace: false,
  ignoreWhitespaceChange: false,
  ignoreEol: false,
  ignoreBlankLines: false,
  filters: []
};

const ALL_WHITESPACE = /\s+/g;
const TRAILING_WHITESPACE = /\s+$/;

export function resolveEquality(partial: Partial<EqualityPolicy> = {}, base: EqualityPolicy = DEFAULT_EQUALITY): EqualityPolicy {
  return { ...base, ...partial, filters: [...(partial.filters ?? base.filters)] };
}

export function compileEquality(policy: EqualityPolicy): Result<LineNormalizer> {
  const filters: CompiledFilter[] = [];
  for (const filter of policy.filters) {
    if (filter.enabled === false) continue;
    try {
      filters.push(compileFilter(filter.pattern));
    } catch (err) {
      return fail(ErrorCode.INVALID_FILTER, `Invalid filter ${describeFilter(filter)}: ${err instanceof Error ? err.message : String(err)}`, {
        pattern: filter.pattern
      });
    }
  }
  return ok(new PolicyNormalizer(policy, filters));
}

class PolicyNormalizer implements LineNormalizer {
  constructor(
    readonly policy: EqualityPolicy,
    private readonly filters: CompiledFilter[]
  ) {}

  key(line: Line): string {
    const text = this.normalizeText(line.text);
    if (this.policy.ignoreEol || line.eol === '' || (this.policy.ignoreBlankLines && text === '')) return text;
    return text + line.eol;
  }

  equal(a: Line, b: Line): boolean {
    return this.key(a) === this.key(b);
  }

  isBlank(line: Line): boolean {
    return this.normalizeText(line.text) === '';
  }

  private normalizeText(value: string): string {
    let text = value;
    for (const filter of this.filters) text = filter.strip(text);
    if (this.policy.ignoreAllWhitespace) {
      text = text.replace(ALL_WHITESPACE, '');
    } else if (this.policy.ignoreWhitespaceChange) {
      text = text.replace(TRAILING_WHITESPACE, '').replace(ALL_WHITESPACE, ' ');
    }
    if (this.policy.ignoreCase) text = text.toLowerCase();
    return text;
  }
}

function describeFilter(filter: LineFilter): string {
  return filter.label ? `"${filter.label}"` : `/${filter.pattern}/`;
}
