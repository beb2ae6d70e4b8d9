import {
  ConstantIds,
  isValidId,
  type ConstantId,
  type GenericInstanceId,
  type InstId,
  type TypeId,
} from "./ids.js";
import type { SemIrFile } from "./file.js";

// These queries only read values that have already been computed. Computing a
// specific's values is the evaluation driver's job; here an unresolved region
// or slot reads as `ConstantIds.invalid`.

/** Gets the substituted value of a constant within an instance of a generic. */
export const getConstantInInstance = (
  file: SemIrFile,
  instanceId: GenericInstanceId,
  constantId: ConstantId
): ConstantId => {
  if (!isValidId(instanceId) || !file.constants.isSymbolic(constantId)) {
    return constantId;
  }

  const instance = file.instances.get(instanceId);
  const { instId, location } = file.constants.get(constantId);

  if (!location) {
    return bindingArgument(file, instanceId, instId) ?? constantId;
  }

  // Nested generics are not substituted; a constant owned by another generic
  // keeps its symbolic value.
  if (location.generic !== instance.genericId) {
    return constantId;
  }

  const block = instance[location.index.region];
  if (block.state === "unset") {
    return ConstantIds.invalid;
  }
  return block.value[location.index.index] ?? ConstantIds.invalid;
};

/** Gets the substituted constant value of an instruction within an instance. */
export const getConstantValueInInstance = (
  file: SemIrFile,
  instanceId: GenericInstanceId,
  instId: InstId
): ConstantId =>
  getConstantInInstance(
    file,
    instanceId,
    file.constants.getConstantValue(instId)
  );

/** Gets the substituted value of a type within an instance. */
export const getTypeInInstance = (
  file: SemIrFile,
  instanceId: GenericInstanceId,
  typeId: TypeId
): TypeId =>
  file.typeIdForConstant(getConstantInInstance(file, instanceId, typeId));

/**
 * The argument for `bindingInstId` when it is one of the instance's own
 * generic bindings.
 */
export const bindingArgument = (
  file: SemIrFile,
  instanceId: GenericInstanceId,
  bindingInstId: InstId
): ConstantId | undefined => {
  const binding = file.insts.get(bindingInstId);
  if (binding.kind !== "bind-symbolic-name") {
    return undefined;
  }

  const instance = file.instances.get(instanceId);
  const generic = file.generics.get(instance.genericId);
  const bindings = file.blocks.get(generic.bindingsId);
  if (bindings[binding.bindIndex] !== bindingInstId) {
    return undefined;
  }

  const arg = file.blocks.get(instance.argsId)[binding.bindIndex];
  return arg === undefined
    ? ConstantIds.invalid
    : file.constants.getConstantValue(arg);
};
