import { randomUUID } from 'node:crypto';

export function createId(prefix: string): string {
  return `${prefix}${randomUUID()}`;
}

/** Monotonic ids scoped to one owner, e.g. transactions of a single document. */
export function createSequence(prefix: string): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}${next.toString().padStart(6, '0')}`;
  };
}
