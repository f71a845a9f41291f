export type CompiledFilter = {
  strip(text: string): string;
};

/** Compiles a text filter that removes every match. Throws SyntaxError on bad patterns. */
export function compileFilter(pattern: string): CompiledFilter {
  const re = new RegExp(pattern, 'g');
  return {
    strip(text: string): string {
      return text.replace(re, '');
    }
  };
}
