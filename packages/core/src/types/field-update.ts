/**
 * Tri-state signal for a single updatable field: leave it alone, or set it
 * to an explicit value (which may be the empty string).
 */
export type FieldUpdate<T = string> =
  | { readonly type: 'keep' }
  | { readonly type: 'set'; readonly value: T };

const KEEP: FieldUpdate<never> = { type: 'keep' };

export function keep<T = string>(): FieldUpdate<T> {
  return KEEP;
}

export function set<T = string>(value: T): FieldUpdate<T> {
  return { type: 'set', value };
}

export function isSet<T>(update: FieldUpdate<T>): update is { readonly type: 'set'; readonly value: T } {
  return update.type === 'set';
}
