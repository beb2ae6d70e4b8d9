/**
 * A field that transitions once from unset to set. Keeping the tag explicit
 * means "not computed yet" never collides with a computed value that happens
 * to be empty.
 */
export type WriteOnce<T> =
  | { readonly state: "unset" }
  | { readonly state: "set"; readonly value: T };

export const UNSET: WriteOnce<never> = Object.freeze({ state: "unset" });

export const setOnce = <T>(value: T): WriteOnce<T> =>
  Object.freeze({ state: "set", value });

export const isSet = <T>(
  slot: WriteOnce<T>
): slot is { readonly state: "set"; readonly value: T } => slot.state === "set";

export const valueOr = <T, F>(slot: WriteOnce<T>, fallback: F): T | F =>
  slot.state === "set" ? slot.value : fallback;
