import type { GenericId, GenericInstanceId, InstId, TypeId } from "./ids.js";

export type BuiltinTypeName = "type" | "i32" | "bool";

export type Inst =
  | EntityDeclInst
  | BuiltinTypeInst
  | IntLiteralInst
  | BoolLiteralInst
  | BindSymbolicNameInst
  | PointerTypeInst
  | TupleTypeInst
  | TupleValueInst
  | IntAddInst
  | ClassTypeRefInst
  | ClassTypeInst
  | NameRefInst
  | ParamInst
  | CallInst;

export type InstKind = Inst["kind"];

/** Declaration of a named entity; generics point at it as their `declId`. */
export interface EntityDeclInst {
  kind: "entity-decl";
  entity: "class" | "interface" | "function";
  name: string;
}

export interface BuiltinTypeInst {
  kind: "builtin-type";
  name: BuiltinTypeName;
}

export interface IntLiteralInst {
  kind: "int-literal";
  value: number;
}

export interface BoolLiteralInst {
  kind: "bool-literal";
  value: boolean;
}

/** A compile-time parameter. `bindIndex` is its position in the generic's bindings. */
export interface BindSymbolicNameInst {
  kind: "bind-symbolic-name";
  name: string;
  bindIndex: number;
  type: TypeId;
}

export interface PointerTypeInst {
  kind: "pointer-type";
  pointee: InstId;
}

export interface TupleTypeInst {
  kind: "tuple-type";
  elements: readonly InstId[];
}

export interface TupleValueInst {
  kind: "tuple-value";
  elements: readonly InstId[];
}

export interface IntAddInst {
  kind: "int-add";
  lhs: InstId;
  rhs: InstId;
}

/** A generic class applied to arguments as written at a use site. */
export interface ClassTypeRefInst {
  kind: "class-type-ref";
  generic: GenericId;
  args: readonly InstId[];
}

/** The canonical form of a class type: a generic and one of its specifics. */
export interface ClassTypeInst {
  kind: "class-type";
  generic: GenericId;
  instance: GenericInstanceId;
}

export interface NameRefInst {
  kind: "name-ref";
  name: string;
  target: InstId;
}

export interface ParamInst {
  kind: "param";
  name: string;
  type: TypeId;
}

export interface CallInst {
  kind: "call";
  callee: InstId;
  args: readonly InstId[];
}

/** Instruction kinds whose constant value, when they have one, is a type. */
const TYPE_KINDS: ReadonlySet<InstKind> = new Set<InstKind>([
  "builtin-type",
  "pointer-type",
  "tuple-type",
  "class-type",
]);

export const isTypeInstKind = (kind: InstKind): boolean => TYPE_KINDS.has(kind);

/**
 * Lists the instruction operands of `inst` in a fixed order. Class-type
 * arguments live in a block owned by the instance store and are not listed.
 */
export const instOperands = (inst: Inst): readonly InstId[] => {
  switch (inst.kind) {
    case "pointer-type":
      return [inst.pointee];
    case "tuple-type":
    case "tuple-value":
      return inst.elements;
    case "int-add":
      return [inst.lhs, inst.rhs];
    case "class-type-ref":
      return inst.args;
    case "name-ref":
      return [inst.target];
    case "call":
      return [inst.callee, ...inst.args];
    case "entity-decl":
    case "builtin-type":
    case "int-literal":
    case "bool-literal":
    case "bind-symbolic-name":
    case "class-type":
    case "param":
      return [];
  }
};

/** Rebuilds `inst` with each operand replaced by `map(operand)`. */
export const mapInstOperands = (inst: Inst, map: (id: InstId) => InstId): Inst => {
  switch (inst.kind) {
    case "pointer-type":
      return { ...inst, pointee: map(inst.pointee) };
    case "tuple-type":
    case "tuple-value":
      return { ...inst, elements: inst.elements.map(map) };
    case "int-add":
      return { ...inst, lhs: map(inst.lhs), rhs: map(inst.rhs) };
    case "class-type-ref":
      return { ...inst, args: inst.args.map(map) };
    case "name-ref":
      return { ...inst, target: map(inst.target) };
    case "call":
      return { ...inst, callee: map(inst.callee), args: inst.args.map(map) };
    case "entity-decl":
    case "builtin-type":
    case "int-literal":
    case "bool-literal":
    case "bind-symbolic-name":
    case "class-type":
    case "param":
      return inst;
  }
};

/** Structural key used to intern constant instructions. */
export const instKey = (inst: Inst): string => {
  const operands = Object.entries(inst)
    .filter(([key]) => key !== "kind")
    .sort(([left], [right]) => left.localeCompare(right));
  return `${inst.kind}${JSON.stringify(operands)}`;
};
