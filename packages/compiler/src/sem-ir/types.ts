import { TypeIds, isValidId, type ConstantId, type TypeId } from "./ids.js";
import { isTypeInstKind, type BuiltinTypeName } from "./inst.js";
import type { ConstantStore } from "./constant-store.js";
import type { InstStore } from "./inst-store.js";
import { assertContract } from "./contracts.js";

export type BuiltinTypes = Readonly<Record<BuiltinTypeName, TypeId>>;

export const seedBuiltinTypes = (constants: ConstantStore): BuiltinTypes => {
  const intern = (name: BuiltinTypeName): TypeId =>
    constants.intern({ kind: "builtin-type", name }, "template");
  return Object.freeze({
    type: intern("type"),
    i32: intern("i32"),
    bool: intern("bool"),
  });
};

/**
 * Whether `constantId` names a type value: a type-kind instruction, or a
 * binding whose own type is `type`.
 */
export const isTypeConstant = ({
  constantId,
  constants,
  insts,
  builtins,
}: {
  constantId: ConstantId;
  constants: ConstantStore;
  insts: InstStore;
  builtins: BuiltinTypes;
}): boolean => {
  if (!isValidId(constantId)) {
    return false;
  }
  const inst = insts.get(constants.getInstId(constantId));
  if (inst.kind === "bind-symbolic-name") {
    return inst.type === builtins.type;
  }
  return isTypeInstKind(inst.kind);
};

/** Maps a type-valued constant back to its type id. Sentinels pass through. */
export const typeIdForConstant = (
  args: Parameters<typeof isTypeConstant>[0]
): TypeId => {
  const { constantId } = args;
  if (constantId === TypeIds.error) {
    return TypeIds.error;
  }
  if (!isValidId(constantId)) {
    return TypeIds.invalid;
  }
  assertContract(
    isTypeConstant(args),
    `constant ${constantId} is not a type value`
  );
  return constantId;
};
