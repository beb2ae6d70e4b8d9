import {
  formatConstantId,
  formatGeneric,
  formatGenericId,
  formatGenericInstanceId,
  isValidId,
  valueOr,
  type ConstantId,
  type Diagnostic,
  type GenericId,
  type InstId,
  type MemUsageEntry,
  type SemIrFile,
} from "@semir/compiler";
import type { CheckedProgram } from "./program.js";

export type GenericDump = {
  id: string;
  name: string;
  record: string;
  bindings: string[];
  selfInstance: string;
  defined: boolean;
};

export type InstanceDump = {
  id: string;
  generic: string;
  args: string;
  /** The instance written as `Name(arg, ...)`. */
  label: string;
  /** `null` while the region is unresolved. */
  declaration: string[] | null;
  definition: string[] | null;
};

export type ProgramDump = {
  file: string;
  generics: GenericDump[];
  instances: InstanceDump[];
  diagnostics: Diagnostic[];
  memUsage?: MemUsageEntry[];
};

type Describer = {
  inst: (id: InstId) => string;
  constant: (id: ConstantId) => string;
};

const createDescriber = (
  file: SemIrFile,
  genericNames: ReadonlyMap<GenericId, string>,
): Describer => {
  const { insts, blocks, constants, instances } = file;
  const genericName = (id: GenericId) => genericNames.get(id) ?? formatGenericId(id);
  const list = (ids: readonly InstId[]) => ids.map(describeInst).join(", ");

  function describeInst(id: InstId): string {
    const inst = insts.get(id);
    switch (inst.kind) {
      case "builtin-type":
      case "bind-symbolic-name":
      case "name-ref":
      case "param":
        return inst.name;
      case "int-literal":
      case "bool-literal":
        return String(inst.value);
      case "entity-decl":
        return `${inst.entity} ${inst.name}`;
      case "pointer-type":
        return `${describeInst(inst.pointee)}*`;
      case "tuple-type":
      case "tuple-value":
        return `(${list(inst.elements)})`;
      case "int-add":
        return `${describeInst(inst.lhs)} + ${describeInst(inst.rhs)}`;
      case "class-type-ref":
        return `${genericName(inst.generic)}(${list(inst.args)})`;
      case "class-type":
        return `${genericName(inst.generic)}(${list(
          blocks.get(instances.get(inst.instance).argsId),
        )})`;
      case "call":
        return `${describeInst(inst.callee)}(${list(inst.args)})`;
    }
  }

  return {
    inst: describeInst,
    constant: (id) =>
      isValidId(id) ? describeInst(constants.getInstId(id)) : formatConstantId(id),
  };
};

/** Builds the structured dump of a checked program. */
export const dumpProgram = (
  checked: CheckedProgram,
  { memUsage = false }: { memUsage?: boolean } = {},
): ProgramDump => {
  const { file, diagnostics } = checked.context;
  const genericNames = new Map(
    Array.from(checked.generics.entries()).map(([name, id]) => [id, name]),
  );
  const describe = createDescriber(file, genericNames);

  const generics = Array.from(file.generics.entries()).map(
    ([id, generic]): GenericDump => ({
      id: formatGenericId(id),
      name: genericNames.get(id) ?? formatGenericId(id),
      record: formatGeneric(generic),
      bindings: file.blocks.get(generic.bindingsId).map(describe.inst),
      selfInstance: formatGenericInstanceId(generic.selfInstanceId),
      defined: generic.definition.state === "set",
    }),
  );

  const records = Array.from(file.instances.entries());
  const instances = file.instances.dump().map((entry, index): InstanceDump => {
    const [, instance] = records[index];
    const values = (region: "declaration" | "definition") =>
      valueOr(instance[region], null)?.map(describe.constant) ?? null;
    const args = file.blocks.get(instance.argsId).map(describe.inst);
    const name = genericNames.get(instance.genericId) ?? entry.generic;
    return {
      ...entry,
      label: `${name}(${args.join(", ")})`,
      declaration: values("declaration"),
      definition: values("definition"),
    };
  });

  return {
    file: file.name,
    generics,
    instances,
    diagnostics: [...diagnostics.diagnostics],
    memUsage: memUsage ? [...file.collectMemUsage().toJSON()] : undefined,
  };
};

const formatValues = (values: string[] | null): string =>
  values ? `[${values.join(", ")}]` : "unresolved";

/**
 * Renders a dump for the terminal. Diagnostics and memory usage are printed
 * separately.
 */
export const formatDumpText = (dump: ProgramDump): string => {
  const lines: string[] = [];
  dump.generics.forEach((generic) => {
    lines.push(
      `${generic.id} ${generic.name}(${generic.bindings.join(", ")}) ${generic.record}${
        generic.defined ? "" : " declared only"
      }`,
    );
  });
  dump.instances.forEach((instance) => {
    lines.push(`${instance.id} ${instance.label}`);
    lines.push(`  declaration: ${formatValues(instance.declaration)}`);
    lines.push(`  definition: ${formatValues(instance.definition)}`);
  });
  return lines.join("\n");
};
