import { reportDiagnostic } from "../diagnostics/index.js";
import {
  ConstantIds,
  formatGenericInstanceId,
  type ConstantId,
  type GenericId,
  type GenericInstanceId,
  type GenericRegion,
  type InstId,
} from "../sem-ir/ids.js";
import {
  instOperands,
  mapInstOperands,
  type Inst,
  type IntAddInst,
} from "../sem-ir/inst.js";
import type { ConstantPhase } from "../sem-ir/constant-store.js";
import type { ValueBlock } from "../sem-ir/generic-instance-store.js";
import { bindingArgument, getConstantInInstance } from "../sem-ir/substitution.js";
import { assertContract, contractViolation } from "../sem-ir/contracts.js";
import type { SemIrFile } from "../sem-ir/file.js";
import { incrementCompilerPerfCounter } from "../perf.js";
import type { CheckContext } from "./context.js";

const I32_MIN = -(2 ** 31);
const I32_MAX = 2 ** 31 - 1;

/** The specific whose values are being computed, and the block built so far. */
interface SpecificEvalState {
  instanceId: GenericInstanceId;
  region: GenericRegion;
  values: ConstantId[];
}

/**
 * Reads operand values for evaluation. Outside a specific, operands keep their
 * own (possibly symbolic) constant values; inside one, symbolic values are
 * replaced by the specific's.
 */
class EvalContext {
  constructor(
    readonly context: CheckContext,
    readonly specific?: SpecificEvalState
  ) {}

  get file(): SemIrFile {
    return this.context.file;
  }

  /** A binding evaluates to the specific's argument at its bind index. */
  substituteBinding(instId: InstId): ConstantId {
    const own = this.file.constants.getConstantValue(instId);
    if (!this.specific) {
      return own;
    }
    return (
      bindingArgument(this.file, this.specific.instanceId, instId) ??
      this.substitute(own)
    );
  }

  getConstantValue(instId: InstId): ConstantId {
    return this.substitute(this.file.constants.getConstantValue(instId));
  }

  substitute(value: ConstantId): ConstantId {
    const { specific } = this;
    const { constants, instances } = this.file;
    if (!specific || !constants.isSymbolic(value)) {
      return value;
    }

    const { instId, location } = constants.get(value);
    if (!location) {
      return bindingArgument(this.file, specific.instanceId, instId) ?? value;
    }

    const instance = instances.get(specific.instanceId);
    if (
      location.generic === instance.genericId &&
      location.index.region === specific.region
    ) {
      return specific.values[location.index.index] ?? ConstantIds.invalid;
    }
    return getConstantInInstance(this.file, specific.instanceId, value);
  }
}

type OperandValues =
  | { ok: true; phase: ConstantPhase; valueOf: (operand: InstId) => ConstantId }
  | { ok: false; value: ConstantId };

// An error dominates, then a runtime operand, then one not known yet.
const FAILURE_ORDER: readonly ConstantId[] = [
  ConstantIds.error,
  ConstantIds.notConstant,
  ConstantIds.invalid,
];

const evalOperands = (
  ctx: EvalContext,
  operands: readonly InstId[]
): OperandValues => {
  const values = new Map<InstId, ConstantId>();
  operands.forEach((operand) => {
    values.set(operand, ctx.getConstantValue(operand));
  });

  const all = Array.from(values.values());
  const failure = FAILURE_ORDER.find((sentinel) => all.includes(sentinel));
  if (failure !== undefined) {
    return { ok: false, value: failure };
  }

  const phase = all.some((value) => ctx.file.constants.isSymbolic(value))
    ? "symbolic"
    : "template";
  return {
    ok: true,
    phase,
    valueOf: (operand) => values.get(operand) ?? ConstantIds.invalid,
  };
};

/** Interns `inst` with every operand replaced by its canonical constant. */
const evalStructural = (ctx: EvalContext, inst: Inst): ConstantId => {
  const operands = evalOperands(ctx, instOperands(inst));
  if (!operands.ok) {
    return operands.value;
  }

  const { constants } = ctx.file;
  const canonical = mapInstOperands(inst, (operand) =>
    constants.getInstId(operands.valueOf(operand))
  );
  return constants.intern(canonical, operands.phase);
};

const evalIntAdd = (
  ctx: EvalContext,
  instId: InstId,
  inst: IntAddInst
): ConstantId => {
  const operands = evalOperands(ctx, [inst.lhs, inst.rhs]);
  if (!operands.ok) {
    return operands.value;
  }
  if (operands.phase === "symbolic") {
    return evalStructural(ctx, inst);
  }

  const { constants, insts } = ctx.file;
  const lhs = insts.get(constants.getInstId(operands.valueOf(inst.lhs)));
  const rhs = insts.get(constants.getInstId(operands.valueOf(inst.rhs)));
  if (lhs.kind !== "int-literal" || rhs.kind !== "int-literal") {
    const operand = lhs.kind !== "int-literal" ? "lhs" : "rhs";
    reportDiagnostic({
      ctx: ctx.context,
      code: "EV0002",
      params: { kind: "invalid-operand", instruction: "int-add", operand },
      span: ctx.context.spanOf(instId),
    });
    return ConstantIds.error;
  }

  const sum = lhs.value + rhs.value;
  if (sum < I32_MIN || sum > I32_MAX) {
    reportDiagnostic({
      ctx: ctx.context,
      code: "EV0001",
      params: { kind: "integer-overflow", lhs: lhs.value, rhs: rhs.value },
      span: ctx.context.spanOf(instId),
    });
    return ConstantIds.error;
  }
  return constants.intern({ kind: "int-literal", value: sum }, "template");
};

const evalClassType = (
  ctx: EvalContext,
  generic: GenericId,
  args: readonly InstId[]
): ConstantId => {
  const operands = evalOperands(ctx, args);
  if (!operands.ok) {
    return operands.value;
  }

  const { blocks, constants, instances } = ctx.file;
  const argsId = blocks.addCanonical(
    args.map((arg) => constants.getInstId(operands.valueOf(arg)))
  );
  const instance = instances.getOrAdd(generic, argsId);
  return constants.intern({ kind: "class-type", generic, instance }, operands.phase);
};

const evalInst = (ctx: EvalContext, instId: InstId, inst: Inst): ConstantId => {
  incrementCompilerPerfCounter("eval.inst");
  const { constants, blocks, instances } = ctx.file;

  switch (inst.kind) {
    case "builtin-type":
    case "int-literal":
    case "bool-literal":
      return constants.intern(inst, "template");
    case "bind-symbolic-name":
      return ctx.specific
        ? ctx.substituteBinding(instId)
        : constants.adopt(instId, "symbolic");
    case "pointer-type":
    case "tuple-type":
    case "tuple-value":
      return evalStructural(ctx, inst);
    case "int-add":
      return evalIntAdd(ctx, instId, inst);
    case "class-type-ref":
      return evalClassType(ctx, inst.generic, inst.args);
    case "class-type":
      return evalClassType(
        ctx,
        inst.generic,
        blocks.get(instances.get(inst.instance).argsId)
      );
    case "name-ref":
      return ctx.getConstantValue(inst.target);
    case "entity-decl":
    case "param":
    case "call":
      return ConstantIds.notConstant;
  }
};

/**
 * Determines the phase of `inst`. Returns its constant value when it has
 * constant phase, `ConstantIds.notConstant` when it has runtime phase.
 */
export const tryEvalInst = (
  context: CheckContext,
  instId: InstId,
  inst: Inst
): ConstantId => evalInst(new EvalContext(context), instId, inst);

/**
 * Evaluates the eval block of one region of a generic for a specific, and
 * stores the resulting value block on the specific.
 */
export const tryEvalBlockForSpecific = (
  context: CheckContext,
  instanceId: GenericInstanceId,
  region: GenericRegion
): ValueBlock => {
  const { generics, instances, blocks, insts } = context.file;
  const instance = instances.get(instanceId);
  const evalBlock = generics.getEvalBlock(instance.genericId, region);
  if (evalBlock.state !== "set") {
    return contractViolation(
      `${region} region of generic ${instance.genericId} is not sealed; cannot evaluate ${formatGenericInstanceId(instanceId)}`
    );
  }
  assertContract(
    instance[region].state === "unset",
    () => `${region} region of ${formatGenericInstanceId(instanceId)} is already resolved`
  );
  assertContract(
    region === "declaration" || instance.declaration.state === "set",
    () =>
      `definition region of ${formatGenericInstanceId(instanceId)} is evaluated before its declaration is resolved`
  );

  incrementCompilerPerfCounter("eval.specific-region");
  const values: ConstantId[] = [];
  const ctx = new EvalContext(context, { instanceId, region, values });
  blocks.get(evalBlock.value).forEach((instId) => {
    values.push(evalInst(ctx, instId, insts.get(instId)));
  });

  instances.setValueBlock(instanceId, region, values);
  return values;
};
