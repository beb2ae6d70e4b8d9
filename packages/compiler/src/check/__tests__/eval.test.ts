import { describe, expect, it } from "vitest";
import { CheckContext } from "../context.js";
import {
  addBinding,
  finishGenericDecl,
  resolveSpecificDeclaration,
  startGenericDecl,
} from "../generic.js";
import { SemIrFile } from "../../sem-ir/file.js";
import { ConstantIds, type InstId, type TypeId } from "../../sem-ir/ids.js";
import { declareGenericClass, specificOf } from "./support/declare-generic.js";

const createContext = () =>
  new CheckContext({ file: new SemIrFile("eval.semir") });

const literal = (context: CheckContext, value: number): InstId =>
  context.addInst({ kind: "int-literal", value });

const valueOf = (context: CheckContext, instId: InstId) =>
  context.file.constants.getConstantValue(instId);

/** Declares `name(binding:! type, ...)` whose declaration also holds `extra`. */
const declareWith = (
  context: CheckContext,
  binding: { name: string; type: TypeId },
  extra: (context: CheckContext, binding: InstId) => InstId
) => {
  startGenericDecl(context);
  const bindingId = addBinding(context, binding);
  const extraId = extra(context, bindingId);
  const declId = context.addInst({ kind: "entity-decl", entity: "function", name: "f" });
  return { genericId: finishGenericDecl(context, declId), bindingId, extraId };
};

describe("constant evaluation while checking", () => {
  it("interns literals as shared template constants", () => {
    const context = createContext();
    const first = literal(context, 7);
    const second = literal(context, 7);

    expect(valueOf(context, first)).toBe(valueOf(context, second));
    expect(context.file.constants.isTemplate(valueOf(context, first))).toBe(true);
    expect(context.constantInstOf(first)).not.toBe(first);
  });

  it("folds integer addition", () => {
    const context = createContext();
    const sum = context.addInst({
      kind: "int-add",
      lhs: literal(context, 2),
      rhs: literal(context, 3),
    });

    expect(context.file.insts.get(context.constantInstOf(sum))).toEqual({
      kind: "int-literal",
      value: 5,
    });
  });

  it("reports overflow and produces an error constant", () => {
    const context = createContext();
    const span = { file: "eval.semir", start: 4, end: 9 };
    const sum = context.addInst(
      {
        kind: "int-add",
        lhs: literal(context, 2147483647),
        rhs: literal(context, 1),
      },
      span
    );

    expect(valueOf(context, sum)).toBe(ConstantIds.error);
    expect(context.diagnostics.diagnostics).toEqual([
      expect.objectContaining({
        code: "EV0001",
        message: "integer overflow evaluating 2147483647 + 1",
        phase: "evaluation",
        span,
      }),
    ]);
  });

  it("reports operands of the wrong kind", () => {
    const context = createContext();
    const sum = context.addInst({
      kind: "int-add",
      lhs: literal(context, 1),
      rhs: context.addInst({ kind: "bool-literal", value: true }),
    });

    expect(valueOf(context, sum)).toBe(ConstantIds.error);
    expect(context.diagnostics.diagnostics[0]?.message).toBe(
      "operand rhs of int-add has the wrong kind of value"
    );
  });

  it("classifies parameters and calls as runtime values", () => {
    const context = createContext();
    const param = context.addInst({
      kind: "param",
      name: "x",
      type: context.file.builtins.i32,
    });
    const call = context.addInst({ kind: "call", callee: param, args: [] });
    const sum = context.addInst({ kind: "int-add", lhs: param, rhs: literal(context, 1) });

    expect(valueOf(context, param)).toBe(ConstantIds.notConstant);
    expect(valueOf(context, call)).toBe(ConstantIds.notConstant);
    expect(valueOf(context, sum)).toBe(ConstantIds.notConstant);
  });

  it("lets an error operand dominate a runtime one", () => {
    const context = createContext();
    const overflow = context.addInst({
      kind: "int-add",
      lhs: literal(context, 2147483647),
      rhs: literal(context, 2147483647),
    });
    const param = context.addInst({
      kind: "param",
      name: "x",
      type: context.file.builtins.i32,
    });
    const tuple = context.addInst({ kind: "tuple-value", elements: [overflow, param] });

    expect(valueOf(context, tuple)).toBe(ConstantIds.error);
    expect(context.diagnostics.diagnostics).toHaveLength(1);
  });

  it("forwards name references to their target's value", () => {
    const context = createContext();
    const { constants, builtins } = context.file;
    const ref = context.addInst({
      kind: "name-ref",
      name: "i32",
      target: constants.getInstId(builtins.i32),
    });

    expect(valueOf(context, ref)).toBe(builtins.i32);
  });

  it("interns structural types by their canonical operands", () => {
    const context = createContext();
    const { constants, builtins } = context.file;
    const elements = [constants.getInstId(builtins.i32), constants.getInstId(builtins.bool)];
    const first = context.addInst({ kind: "tuple-type", elements });
    const second = context.addInst({ kind: "tuple-type", elements });

    expect(valueOf(context, first)).toBe(valueOf(context, second));
    expect(context.file.isTypeConstant(valueOf(context, first))).toBe(true);
  });

  it("interns class types through the instance table", () => {
    const context = createContext();
    const { constants, insts, builtins } = context.file;
    const box = declareGenericClass(context, "Box", [
      { name: "T", type: builtins.type },
    ]);
    const i32Inst = constants.getInstId(builtins.i32);
    const first = context.addInst({
      kind: "class-type-ref",
      generic: box.genericId,
      args: [i32Inst],
    });
    const second = context.addInst({
      kind: "class-type-ref",
      generic: box.genericId,
      args: [i32Inst],
    });

    expect(valueOf(context, first)).toBe(valueOf(context, second));
    expect(constants.isTemplate(valueOf(context, first))).toBe(true);
    expect(insts.get(context.constantInstOf(first))).toEqual({
      kind: "class-type",
      generic: box.genericId,
      instance: specificOf(context, box.genericId, builtins.i32),
    });
    expect(() =>
      context.addInst({
        kind: "class-type-ref",
        generic: box.genericId,
        args: [i32Inst, i32Inst],
      })
    ).toThrow("generic 0 takes 1 arguments, received 2");
  });
});

describe("constant evaluation for specifics", () => {
  it("evaluates a type built from a binding", () => {
    const context = createContext();
    const { constants, insts, builtins } = context.file;
    const wrap = declareWith(context, { name: "T", type: builtins.type }, (ctx, t) =>
      ctx.addInst({
        kind: "tuple-type",
        elements: [t, constants.getInstId(builtins.i32)],
      })
    );

    expect(constants.isSymbolic(valueOf(context, wrap.extraId))).toBe(true);

    const specific = specificOf(context, wrap.genericId, builtins.bool);
    const values = resolveSpecificDeclaration(context, specific);

    expect(values).toHaveLength(2);
    expect(values[0]).toBe(builtins.bool);
    expect(insts.get(constants.getInstId(values[1]))).toEqual({
      kind: "tuple-type",
      elements: [constants.getInstId(builtins.bool), constants.getInstId(builtins.i32)],
    });
  });

  it("evaluates a single-slot eval block that names a binding", () => {
    const context = createContext();
    const { builtins } = context.file;
    const generic = declareGenericClass(context, "Single", [
      { name: "T", type: builtins.type },
    ]);
    const specific = specificOf(context, generic.genericId, builtins.i32);

    expect(resolveSpecificDeclaration(context, specific)).toEqual([builtins.i32]);
  });

  it("folds arithmetic on a value binding", () => {
    const context = createContext();
    const { constants, insts, builtins } = context.file;
    const addOne = declareWith(context, { name: "N", type: builtins.i32 }, (ctx, n) =>
      ctx.addInst({ kind: "int-add", lhs: n, rhs: literal(ctx, 1) })
    );
    const fortyOne = constants.intern({ kind: "int-literal", value: 41 }, "template");

    const specific = specificOf(context, addOne.genericId, fortyOne);
    const values = resolveSpecificDeclaration(context, specific);

    expect(values[0]).toBe(fortyOne);
    expect(insts.get(constants.getInstId(values[1]))).toEqual({
      kind: "int-literal",
      value: 42,
    });
  });

  it("reports overflow found only for a particular specific", () => {
    const context = createContext();
    const { constants, builtins } = context.file;
    const addOne = declareWith(context, { name: "N", type: builtins.i32 }, (ctx, n) =>
      ctx.addInst({ kind: "int-add", lhs: n, rhs: literal(ctx, 1) })
    );
    expect(context.diagnostics.diagnostics).toHaveLength(0);

    const max = constants.intern({ kind: "int-literal", value: 2147483647 }, "template");
    const specific = specificOf(context, addOne.genericId, max);

    expect(resolveSpecificDeclaration(context, specific)).toEqual([
      max,
      ConstantIds.error,
    ]);
    expect(context.diagnostics.diagnostics).toEqual([
      expect.objectContaining({
        code: "EV0001",
        message: "integer overflow evaluating 2147483647 + 1",
        span: { file: "eval.semir", start: 0, end: 0 },
      }),
    ]);
  });
});
