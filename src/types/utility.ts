/**
 * Utility Types
 * @module types/utility
 */

/** Nominal wrapper: a `Brand<string, 'RuleId'>` is not assignable from a plain string */
export type Brand<T, B extends string> = T & { readonly __brand: B };

/**
 * Returns the single place a raw value is stamped with brand `B`
 */
export function makeBrandedFactory<T, B extends string>(): (value: T) => Brand<T, B> {
  return (value: T) => value as Brand<T, B>;
}

/** Opaque rule identifier assigned at mount time */
export type RuleId = Brand<string, 'RuleId'>;

export const createRuleId = makeBrandedFactory<string, 'RuleId'>();

/** Where a rule lives: until server stop, or until its guard is released */
export type RuleScope = 'global' | 'scoped';
