import { reportDiagnostic, type SourceSpan } from "../diagnostics/index.js";
import {
  ConstantIds,
  formatGenericInstanceId,
  type ConstantId,
  type GenericId,
  type GenericInstanceId,
  type InstId,
  type TypeId,
} from "../sem-ir/ids.js";
import type { ValueBlock } from "../sem-ir/generic-instance-store.js";
import { getConstantValueInInstance } from "../sem-ir/substitution.js";
import { assertContract, contractViolation } from "../sem-ir/contracts.js";
import type { CheckContext } from "./context.js";
import { tryEvalBlockForSpecific } from "./eval.js";

// Checking a generic runs in two regions. Each must be finished before any
// specific resolves it:
//
//   startGenericDecl -> addBinding* -> finishGenericDecl
//   startGenericDefinition -> finishGenericDefinition

export const startGenericDecl = (context: CheckContext): void => {
  context.genericRegions.push("declaration");
};

/** Declares the next compile-time binding of the generic being declared. */
export const addBinding = (
  context: CheckContext,
  { name, type, span }: { name: string; type: TypeId; span?: SourceSpan }
): InstId => {
  const region = context.genericRegions.peek();
  if (region?.region !== "declaration") {
    return contractViolation(
      `binding ${name} declared outside a generic declaration`
    );
  }
  const id = context.addInst(
    {
      kind: "bind-symbolic-name",
      name,
      bindIndex: region.bindings.length,
      type,
    },
    span
  );
  region.bindings.push(id);
  return id;
};

/**
 * Ends the declaration region: creates the generic with its self instance and
 * seals the declaration eval block.
 */
export const finishGenericDecl = (
  context: CheckContext,
  declId: InstId
): GenericId => {
  const region = context.genericRegions.pop();
  assertContract(
    region.region === "declaration",
    "finishGenericDecl called while a definition region is open"
  );

  const { blocks, constants, generics } = context.file;
  const genericId = generics.create({
    declId,
    bindingsId: blocks.addCanonical(region.bindings),
  });
  region.constants.forEach((constant) =>
    constants.attachGeneric(constant, genericId)
  );
  generics.setEvalBlock(genericId, "declaration", blocks.add(region.evalInsts));
  return genericId;
};

/** Abandons a declaration region, e.g. after a redeclaration was diagnosed. */
export const discardGenericDecl = (context: CheckContext): void => {
  const region = context.genericRegions.pop();
  assertContract(
    region.region === "declaration",
    "discardGenericDecl called while a definition region is open"
  );
};

export const startGenericDefinition = (
  context: CheckContext,
  genericId: GenericId
): void => {
  assertContract(
    context.file.generics.getEvalBlock(genericId, "declaration").state === "set",
    `generic ${genericId} is defined before its declaration is finished`
  );
  context.genericRegions.push("definition", genericId);
};

export const finishGenericDefinition = (
  context: CheckContext,
  genericId: GenericId
): void => {
  const region = context.genericRegions.pop();
  assertContract(
    region.region === "definition" && region.generic === genericId,
    `finishGenericDefinition(${genericId}) does not match the open region`
  );
  const { blocks, generics } = context.file;
  generics.setEvalBlock(genericId, "definition", blocks.add(region.evalInsts));
};

/** Resolves the declaration region of a specific, if not done already. */
export const resolveSpecificDeclaration = (
  context: CheckContext,
  instanceId: GenericInstanceId
): ValueBlock => {
  const block = context.file.instances.getValueBlock(instanceId, "declaration");
  return block.state === "set"
    ? block.value
    : tryEvalBlockForSpecific(context, instanceId, "declaration");
};

/**
 * Resolves the definition region of a specific, resolving its declaration
 * first. Returns `undefined` while the generic's definition is unfinished.
 */
export const resolveSpecificDefinition = (
  context: CheckContext,
  instanceId: GenericInstanceId
): ValueBlock | undefined => {
  const { generics, instances } = context.file;
  resolveSpecificDeclaration(context, instanceId);

  const block = instances.getValueBlock(instanceId, "definition");
  if (block.state === "set") {
    return block.value;
  }
  const { genericId } = instances.get(instanceId);
  if (generics.getEvalBlock(genericId, "definition").state === "unset") {
    return undefined;
  }
  return tryEvalBlockForSpecific(context, instanceId, "definition");
};

/**
 * Like `resolveSpecificDefinition`, but a missing definition is reported to
 * the user at `span`.
 */
export const requireSpecificDefinition = (
  context: CheckContext,
  instanceId: GenericInstanceId,
  span: SourceSpan
): ValueBlock | undefined => {
  const block = resolveSpecificDefinition(context, instanceId);
  if (!block) {
    reportDiagnostic({
      ctx: context,
      code: "CK0003",
      params: {
        kind: "definition-unavailable",
        specific: formatGenericInstanceId(instanceId),
      },
      span,
    });
  }
  return block;
};

/**
 * Reads the value of `instId` in a specific and reports a diagnostic when it
 * is not known yet or is not a constant. Returns the value read.
 */
export const requireConstantInInstance = (
  context: CheckContext,
  {
    instanceId,
    instId,
    name,
    span,
  }: {
    instanceId: GenericInstanceId;
    instId: InstId;
    name: string;
    span?: SourceSpan;
  }
): ConstantId => {
  const value = getConstantValueInInstance(context.file, instanceId, instId);
  const at = span ?? context.spanOf(instId);

  if (value === ConstantIds.invalid) {
    reportDiagnostic({
      ctx: context,
      code: "CK0001",
      params: {
        kind: "unknown-in-specific",
        name,
        specific: formatGenericInstanceId(instanceId),
      },
      span: at,
    });
  } else if (value === ConstantIds.notConstant) {
    reportDiagnostic({
      ctx: context,
      code: "CK0002",
      params: { kind: "not-constant", name },
      span: at,
    });
  }
  return value;
};
