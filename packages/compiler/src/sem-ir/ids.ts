/**
 * Identifier aliases for the semantic IR. Every store is an append-only arena
 * and these ids are indices into it, so they stay valid for the lifetime of the
 * compilation unit and can be cached freely.
 */
export type InstId = number;
export type InstBlockId = number;
export type ConstantId = number;
export type GenericId = number;
export type GenericInstanceId = number;

// A type is identified by the constant id of its type value.
export type TypeId = ConstantId;

export const INVALID_ID = -1;

export const ConstantIds = {
  /** Not yet known, e.g. a specific region that has not been resolved. */
  invalid: -1,
  /** Known to have runtime phase. */
  notConstant: -2,
  /** Evaluation failed and a diagnostic was reported. */
  error: -3,
} as const;

export const TypeIds = {
  invalid: ConstantIds.invalid,
  error: ConstantIds.error,
} as const;

export const isValidId = (id: number): boolean => id >= 0;

export type GenericRegion = "declaration" | "definition";

/** Locates a symbolic constant within one region's eval block. */
export interface GenericInstIndex {
  region: GenericRegion;
  index: number;
}

export const formatInstId = (id: InstId): string =>
  isValidId(id) ? `inst${id}` : "inst<invalid>";

export const formatInstBlockId = (id: InstBlockId): string =>
  isValidId(id) ? `block${id}` : "block<invalid>";

export const formatGenericId = (id: GenericId): string =>
  isValidId(id) ? `generic${id}` : "generic<invalid>";

export const formatGenericInstanceId = (id: GenericInstanceId): string =>
  isValidId(id) ? `instance${id}` : "instance<invalid>";

export const formatConstantId = (id: ConstantId): string => {
  switch (id) {
    case ConstantIds.invalid:
      return "constant<unknown>";
    case ConstantIds.notConstant:
      return "constant<runtime>";
    case ConstantIds.error:
      return "constant<error>";
    default:
      return `constant${id}`;
  }
};
