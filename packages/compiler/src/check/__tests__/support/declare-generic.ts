import type { CheckContext } from "../../context.js";
import { addBinding, finishGenericDecl, startGenericDecl } from "../../generic.js";
import type {
  ConstantId,
  GenericId,
  GenericInstanceId,
  InstId,
  TypeId,
} from "../../../sem-ir/ids.js";

export type DeclaredGeneric = {
  genericId: GenericId;
  declId: InstId;
  bindings: InstId[];
};

/** Checks the declaration region of a class taking the given bindings. */
export const declareGenericClass = (
  context: CheckContext,
  name: string,
  bindings: { name: string; type: TypeId }[]
): DeclaredGeneric => {
  startGenericDecl(context);
  const ids = bindings.map((binding) => addBinding(context, binding));
  const declId = context.addInst({ kind: "entity-decl", entity: "class", name });
  return { genericId: finishGenericDecl(context, declId), declId, bindings: ids };
};

/** Gets or adds the specific of `genericId` for constant arguments. */
export const specificOf = (
  context: CheckContext,
  genericId: GenericId,
  ...args: ConstantId[]
): GenericInstanceId => {
  const { blocks, constants, instances } = context.file;
  return instances.getOrAdd(
    genericId,
    blocks.addCanonical(args.map((arg) => constants.getInstId(arg)))
  );
};
