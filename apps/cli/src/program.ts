import { readFile } from "node:fs/promises";
import {
  CheckContext,
  SemIrFile,
  addBinding,
  finishGenericDecl,
  finishGenericDefinition,
  isValidId,
  requireSpecificDefinition,
  resolveSpecificDeclaration,
  startGenericDecl,
  startGenericDefinition,
  type GenericId,
  type GenericInstanceId,
  type Inst,
  type InstId,
  type SourceSpan,
  type TypeId,
} from "@semir/compiler";
import type { ResolveMode } from "./config/types.js";

/**
 * An operand as written in a program: a name in scope (a binding, an earlier
 * instruction, or a builtin type), an integer literal, or a bool literal.
 */
export type OperandRef = string | number | boolean;

export type ProgramInst =
  | { name: string; op: "pointer-type"; pointee: OperandRef }
  | { name: string; op: "tuple-type" | "tuple-value"; elements: OperandRef[] }
  | { name: string; op: "int-add"; lhs: OperandRef; rhs: OperandRef }
  | { name: string; op: "class-type"; generic: string; args: OperandRef[] }
  | { name: string; op: "ref"; target: OperandRef }
  | { name: string; op: "param"; type: OperandRef }
  | { name: string; op: "call"; callee: OperandRef; args: OperandRef[] };

export type ProgramOp = ProgramInst["op"];

export type ProgramBinding = { name: string; type: OperandRef };

export type EntityKind = "class" | "interface" | "function";

export type ProgramGeneric = {
  name: string;
  entity: EntityKind;
  bindings: ProgramBinding[];
  declaration: ProgramInst[];
  /** Absent while the generic is only declared. */
  definition?: ProgramInst[];
};

export type ProgramSpecific = { generic: string; args: OperandRef[] };

export type Program = {
  file: string;
  source: string;
  generics: ProgramGeneric[];
  specifics: ProgramSpecific[];
};

export class ProgramError extends Error {
  constructor(
    readonly file: string,
    readonly path: string,
    message: string,
  ) {
    super(`${file}: ${path}: ${message}`);
    this.name = "ProgramError";
  }
}

const PROGRAM_OPS: readonly ProgramOp[] = [
  "pointer-type",
  "tuple-type",
  "tuple-value",
  "int-add",
  "class-type",
  "ref",
  "param",
  "call",
];

const ENTITY_KINDS: readonly EntityKind[] = ["class", "interface", "function"];

const I32_MIN = -(2 ** 31);
const I32_MAX = 2 ** 31 - 1;

const BUILTIN_NAMES = ["type", "i32", "bool"] as const;
type BuiltinName = (typeof BUILTIN_NAMES)[number];

const isBuiltinName = (name: string): name is BuiltinName =>
  BUILTIN_NAMES.some((builtin) => builtin === name);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

class ProgramReader {
  constructor(readonly file: string) {}

  fail(path: string, message: string): never {
    throw new ProgramError(this.file, path, message);
  }

  record(value: unknown, path: string): Record<string, unknown> {
    return isRecord(value) ? value : this.fail(path, "must be an object");
  }

  array(value: unknown, path: string): unknown[] {
    return Array.isArray(value) ? value : this.fail(path, "must be an array");
  }

  string(value: unknown, path: string): string {
    return typeof value === "string" && value.length > 0
      ? value
      : this.fail(path, "must be a non-empty string");
  }

  choice<T extends string>(value: unknown, path: string, choices: readonly T[]): T {
    const match = choices.find((choice) => choice === value);
    return match ?? this.fail(path, `must be one of ${choices.join(", ")}`);
  }

  operand(value: unknown, path: string): OperandRef {
    if (typeof value === "boolean") {
      return value;
    }
    if (typeof value === "string") {
      return this.string(value, path);
    }
    if (typeof value === "number") {
      if (!Number.isInteger(value)) {
        return this.fail(path, "must be an integer");
      }
      return value >= I32_MIN && value <= I32_MAX
        ? value
        : this.fail(path, `must be a 32-bit signed integer, received ${value}`);
    }
    return this.fail(path, "must be a name, an integer or a bool");
  }

  operands(value: unknown, path: string): OperandRef[] {
    return this.array(value, path).map((entry, index) =>
      this.operand(entry, `${path}[${index}]`),
    );
  }
}

const parseInst = (
  reader: ProgramReader,
  value: unknown,
  path: string,
): ProgramInst => {
  const entry = reader.record(value, path);
  const name = reader.string(entry.name, `${path}.name`);
  const op = reader.choice(entry.op, `${path}.op`, PROGRAM_OPS);
  const operand = (key: string) => reader.operand(entry[key], `${path}.${key}`);
  const operands = (key: string) => reader.operands(entry[key], `${path}.${key}`);

  switch (op) {
    case "pointer-type":
      return { name, op, pointee: operand("pointee") };
    case "tuple-type":
    case "tuple-value":
      return { name, op, elements: operands("elements") };
    case "int-add":
      return { name, op, lhs: operand("lhs"), rhs: operand("rhs") };
    case "class-type":
      return {
        name,
        op,
        generic: reader.string(entry.generic, `${path}.generic`),
        args: operands("args"),
      };
    case "ref":
      return { name, op, target: operand("target") };
    case "param":
      return { name, op, type: operand("type") };
    case "call":
      return { name, op, callee: operand("callee"), args: operands("args") };
  }
};

const parseGeneric = (
  reader: ProgramReader,
  value: unknown,
  path: string,
): ProgramGeneric => {
  const entry = reader.record(value, path);
  const insts = (key: string) =>
    reader
      .array(entry[key], `${path}.${key}`)
      .map((inst, index) => parseInst(reader, inst, `${path}.${key}[${index}]`));

  return {
    name: reader.string(entry.name, `${path}.name`),
    entity:
      entry.entity === undefined
        ? "class"
        : reader.choice(entry.entity, `${path}.entity`, ENTITY_KINDS),
    bindings: reader.array(entry.bindings, `${path}.bindings`).map((binding, index) => {
      const bindingPath = `${path}.bindings[${index}]`;
      const record = reader.record(binding, bindingPath);
      return {
        name: reader.string(record.name, `${bindingPath}.name`),
        type: reader.operand(record.type ?? "type", `${bindingPath}.type`),
      };
    }),
    declaration: entry.declaration === undefined ? [] : insts("declaration"),
    definition: entry.definition === undefined ? undefined : insts("definition"),
  };
};

/** Validates parsed JSON as a program. */
export const parseProgram = ({
  value,
  file,
  source = "",
}: {
  value: unknown;
  file: string;
  source?: string;
}): Program => {
  const reader = new ProgramReader(file);
  const root = reader.record(value, "$");
  return {
    file,
    source,
    generics: reader
      .array(root.generics, "$.generics")
      .map((generic, index) => parseGeneric(reader, generic, `$.generics[${index}]`)),
    specifics: reader
      .array(root.specifics ?? [], "$.specifics")
      .map((specific, index) => {
        const path = `$.specifics[${index}]`;
        const entry = reader.record(specific, path);
        return {
          generic: reader.string(entry.generic, `${path}.generic`),
          args: reader.operands(entry.args, `${path}.args`),
        };
      }),
  };
};

export const loadProgram = async (path: string): Promise<Program> => {
  const source = await readFile(path, "utf8");
  let value: unknown;
  try {
    value = JSON.parse(source);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ProgramError(path, "$", `invalid JSON (${reason})`);
  }
  return parseProgram({ value, file: path, source });
};

const escapeRegExp = (text: string): string =>
  text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Finds `"key": "value"` in the program source at or after `from`, so
 * diagnostics can point into the JSON file.
 */
export const locateInSource = ({
  program,
  key,
  value,
  from = 0,
}: {
  program: Program;
  key: string;
  value: string;
  from?: number;
}): SourceSpan => {
  const pattern = new RegExp(`"${escapeRegExp(key)}"\\s*:\\s*("${escapeRegExp(value)}")`, "g");
  pattern.lastIndex = from;
  const match = pattern.exec(program.source);
  if (!match || match[1] === undefined) {
    return { file: program.file, start: from, end: from };
  }
  const start = match.index + match[0].length - match[1].length;
  return { file: program.file, start, end: start + match[1].length };
};

export type CheckedSpecific = {
  label: string;
  generic: string;
  instanceId: GenericInstanceId;
  span: SourceSpan;
};

export type CheckedProgram = {
  program: Program;
  context: CheckContext;
  /** Generic ids by name, in declaration order. */
  generics: ReadonlyMap<string, GenericId>;
  specifics: readonly CheckedSpecific[];
};

const describeOperand = (ref: OperandRef): string => String(ref);

/** Checks every generic of the program, then adds each requested specific. */
export const checkProgram = (program: Program): CheckedProgram => {
  const context = new CheckContext({ file: new SemIrFile(program.file) });
  const { constants, builtins } = context.file;
  const reader = new ProgramReader(program.file);
  const generics = new Map<string, GenericId>();

  const literal = (ref: number | boolean, span: SourceSpan): InstId =>
    typeof ref === "number"
      ? context.addInst({ kind: "int-literal", value: ref }, span)
      : context.addInst({ kind: "bool-literal", value: ref }, span);

  const resolveOperand = ({
    ref,
    scope,
    path,
    span,
  }: {
    ref: OperandRef;
    scope: ReadonlyMap<string, InstId>;
    path: string;
    span: SourceSpan;
  }): InstId => {
    if (typeof ref !== "string") {
      return literal(ref, span);
    }
    const local = scope.get(ref);
    if (local !== undefined) {
      return local;
    }
    if (isBuiltinName(ref)) {
      return constants.getInstId(builtins[ref]);
    }
    return reader.fail(path, `unknown name "${ref}"`);
  };

  const resolveType = (args: Parameters<typeof resolveOperand>[0]): TypeId => {
    const value = constants.getConstantValue(resolveOperand(args));
    if (isValidId(value) && !context.file.isTypeConstant(value)) {
      return reader.fail(args.path, `"${describeOperand(args.ref)}" is not a type`);
    }
    return context.file.typeIdForConstant(value);
  };

  const resolveGeneric = (name: string, path: string): GenericId =>
    generics.get(name) ?? reader.fail(path, `unknown generic "${name}"`);

  const checkArgCount = ({
    name,
    genericId,
    received,
    path,
  }: {
    name: string;
    genericId: GenericId;
    received: number;
    path: string;
  }): void => {
    const expected = context.file.generics.bindingCount(genericId);
    if (received !== expected) {
      reader.fail(path, `${name} takes ${expected} arguments, received ${received}`);
    }
  };

  const lowerInst = (
    inst: ProgramInst,
    scope: ReadonlyMap<string, InstId>,
    path: string,
    span: SourceSpan,
  ): Inst => {
    const operand = (ref: OperandRef, key: string) =>
      resolveOperand({ ref, scope, path: `${path}.${key}`, span });
    const operandList = (refs: readonly OperandRef[], key: string) =>
      refs.map((ref, index) => operand(ref, `${key}[${index}]`));

    switch (inst.op) {
      case "pointer-type":
        return { kind: "pointer-type", pointee: operand(inst.pointee, "pointee") };
      case "tuple-type":
        return { kind: "tuple-type", elements: operandList(inst.elements, "elements") };
      case "tuple-value":
        return { kind: "tuple-value", elements: operandList(inst.elements, "elements") };
      case "int-add":
        return {
          kind: "int-add",
          lhs: operand(inst.lhs, "lhs"),
          rhs: operand(inst.rhs, "rhs"),
        };
      case "class-type": {
        const genericId = resolveGeneric(inst.generic, `${path}.generic`);
        checkArgCount({
          name: inst.generic,
          genericId,
          received: inst.args.length,
          path: `${path}.args`,
        });
        return {
          kind: "class-type-ref",
          generic: genericId,
          args: operandList(inst.args, "args"),
        };
      }
      case "ref":
        return { kind: "name-ref", name: inst.name, target: operand(inst.target, "target") };
      case "param":
        return {
          kind: "param",
          name: inst.name,
          type: resolveType({ ref: inst.type, scope, path: `${path}.type`, span }),
        };
      case "call":
        return {
          kind: "call",
          callee: operand(inst.callee, "callee"),
          args: operandList(inst.args, "args"),
        };
    }
  };

  program.generics.forEach((generic, genericIndex) => {
    const path = `$.generics[${genericIndex}]`;
    if (generics.has(generic.name)) {
      reader.fail(`${path}.name`, `duplicate generic "${generic.name}"`);
    }
    const declSpan = locateInSource({ program, key: "name", value: generic.name });
    const scope = new Map<string, InstId>();
    const declare = (name: string, namePath: string, id: () => InstId) => {
      if (scope.has(name)) {
        reader.fail(namePath, `duplicate name "${name}" in ${generic.name}`);
      }
      scope.set(name, id());
    };
    const addInsts = (insts: readonly ProgramInst[], key: string) =>
      insts.forEach((inst, index) => {
        const instPath = `${path}.${key}[${index}]`;
        const span = locateInSource({
          program,
          key: "name",
          value: inst.name,
          from: declSpan.start,
        });
        declare(inst.name, `${instPath}.name`, () =>
          context.addInst(lowerInst(inst, scope, instPath, span), span),
        );
      });

    startGenericDecl(context);
    generic.bindings.forEach((binding, index) => {
      const bindingPath = `${path}.bindings[${index}]`;
      const span = locateInSource({
        program,
        key: "name",
        value: binding.name,
        from: declSpan.start,
      });
      const type = resolveType({
        ref: binding.type,
        scope,
        path: `${bindingPath}.type`,
        span,
      });
      declare(binding.name, `${bindingPath}.name`, () =>
        addBinding(context, { name: binding.name, type, span }),
      );
    });
    addInsts(generic.declaration, "declaration");
    const declId = context.addInst(
      { kind: "entity-decl", entity: generic.entity, name: generic.name },
      declSpan,
    );
    const genericId = finishGenericDecl(context, declId);
    generics.set(generic.name, genericId);

    if (generic.definition) {
      startGenericDefinition(context, genericId);
      addInsts(generic.definition, "definition");
      finishGenericDefinition(context, genericId);
    }
  });

  const specificsStart = program.source.indexOf('"specifics"');
  const specifics = program.specifics.map((specific, index): CheckedSpecific => {
    const path = `$.specifics[${index}]`;
    const genericId = resolveGeneric(specific.generic, `${path}.generic`);
    const span = locateInSource({
      program,
      key: "generic",
      value: specific.generic,
      from: Math.max(specificsStart, 0),
    });
    checkArgCount({
      name: specific.generic,
      genericId,
      received: specific.args.length,
      path: `${path}.args`,
    });

    const args = specific.args.map((ref, argIndex) => {
      const argPath = `${path}.args[${argIndex}]`;
      const value = constants.getConstantValue(
        resolveOperand({ ref, scope: new Map(), path: argPath, span }),
      );
      if (!isValidId(value)) {
        reader.fail(argPath, `"${describeOperand(ref)}" is not a constant`);
      }
      return constants.getInstId(value);
    });

    return {
      label: `${specific.generic}(${specific.args.map(describeOperand).join(", ")})`,
      generic: specific.generic,
      instanceId: context.file.instances.getOrAdd(
        genericId,
        context.file.blocks.addCanonical(args),
      ),
      span,
    };
  });

  return { program, context, generics, specifics };
};

/** Resolves every requested specific up to `mode`. */
export const resolveSpecifics = (
  checked: CheckedProgram,
  mode: ResolveMode,
): void => {
  if (mode === "none") {
    return;
  }
  checked.specifics.forEach(({ instanceId, span }) => {
    if (mode === "declaration") {
      resolveSpecificDeclaration(checked.context, instanceId);
      return;
    }
    requireSpecificDefinition(checked.context, instanceId, span);
  });
};
