import { describe, expect, it } from "vitest";
import { fileURLToPath } from "node:url";
import { DiagnosticError } from "@semir/compiler";
import { runProgramFile } from "../exec.js";
import { dumpProgram, formatDumpText } from "../dump.js";
import {
  ProgramError,
  checkProgram,
  parseProgram,
  resolveSpecifics,
} from "../program.js";

const PAIR_FIXTURE = fileURLToPath(new URL("../../fixtures/pair.json", import.meta.url));
const DECLARED_ONLY_FIXTURE = fileURLToPath(
  new URL("../../fixtures/declared-only.json", import.meta.url),
);

const inline = (value: unknown) =>
  parseProgram({
    value,
    file: "inline.json",
    source: JSON.stringify(value, undefined, 2),
  });

const boxOnly = (extra: Record<string, unknown> = {}) => ({
  generics: [{ name: "Box", bindings: [{ name: "T", type: "type" }], ...extra }],
});

describe("program files", () => {
  it("resolves requested specifics of the fixture program", async () => {
    const { dump } = await runProgramFile({
      program: PAIR_FIXTURE,
      resolve: "definition",
      memUsage: false,
    });

    expect(dump.diagnostics).toEqual([]);
    expect(dump.generics.map((generic) => generic.record)).toEqual([
      "{decl: inst4, bindings: block0}",
      "{decl: inst11, bindings: block3}",
      "{decl: inst22, bindings: block7}",
    ]);
    expect(dump.instances.map((instance) => instance.label)).toEqual([
      "Box(T)",
      "Pair(T, U)",
      "Box(U)",
      "AddOne(N)",
      "Pair(i32, bool)",
      "AddOne(41)",
      "Box(bool)",
    ]);
    expect(dump.instances[4]).toEqual({
      id: "instance4",
      generic: "generic1",
      args: "block10",
      label: "Pair(i32, bool)",
      declaration: ["i32", "bool", "i32*"],
      definition: ["Box(bool)", "(i32*, Box(bool))"],
    });
    expect(dump.instances[5]?.declaration).toEqual(["41", "42"]);
    expect(dump.instances[5]?.definition).toEqual([]);
    expect(dump.instances[6]?.declaration).toBeNull();
  });

  it("renders the dump as text", async () => {
    const { dump } = await runProgramFile({
      program: PAIR_FIXTURE,
      resolve: "declaration",
      memUsage: false,
    });
    const lines = formatDumpText(dump).split("\n");

    expect(lines.slice(0, 3)).toEqual([
      "generic0 Box(T) {decl: inst4, bindings: block0}",
      "generic1 Pair(T, U) {decl: inst11, bindings: block3}",
      "generic2 AddOne(N) {decl: inst22, bindings: block7}",
    ]);
    expect(lines.slice(-6)).toEqual([
      "instance4 Pair(i32, bool)",
      "  declaration: [i32, bool, i32*]",
      "  definition: unresolved",
      "instance5 AddOne(41)",
      "  declaration: [41, 42]",
      "  definition: unresolved",
    ]);
  });

  it("reports memory usage of the instance table", async () => {
    const { memUsage, dump } = await runProgramFile({
      program: PAIR_FIXTURE,
      resolve: "definition",
      memUsage: true,
    });

    expect(memUsage).toBe(
      [
        "generic_instances.instances: 448 used, 512 reserved",
        "generic_instances.lookup: 334 used, 334 reserved",
        "total: 782 used, 846 reserved",
      ].join("\n"),
    );
    expect(dump.memUsage?.map((entry) => entry.label)).toEqual([
      "generic_instances.instances",
      "generic_instances.lookup",
    ]);
  });

  it("raises reported errors together after the run", async () => {
    const { diagnostics } = await runProgramFile({
      program: DECLARED_ONLY_FIXTURE,
      resolve: "definition",
      memUsage: false,
    });

    let thrown: unknown;
    try {
      diagnostics.throwIfErrors();
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(DiagnosticError);
    if (thrown instanceof DiagnosticError) {
      expect(thrown.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(["CK0003"]);
    }
  });
});

describe("program validation", () => {
  it("requires a list of generics", () => {
    expect(() => inline({})).toThrow(
      new ProgramError("inline.json", "$.generics", "must be an array"),
    );
  });

  it("rejects unknown instruction kinds", () => {
    expect(() =>
      inline(boxOnly({ declaration: [{ name: "p", op: "pointer", pointee: "T" }] })),
    ).toThrow(
      "inline.json: $.generics[0].declaration[0].op: must be one of pointer-type, tuple-type, tuple-value, int-add, class-type, ref, param, call",
    );
  });

  it("rejects non-integer literals", () => {
    expect(() =>
      inline(boxOnly({ declaration: [{ name: "s", op: "int-add", lhs: 1, rhs: 1.5 }] })),
    ).toThrow("inline.json: $.generics[0].declaration[0].rhs: must be an integer");
  });

  it("rejects literals outside the 32-bit range", () => {
    expect(() =>
      inline(boxOnly({ declaration: [{ name: "s", op: "int-add", lhs: 3000000000, rhs: 1 }] })),
    ).toThrow(
      "inline.json: $.generics[0].declaration[0].lhs: must be a 32-bit signed integer, received 3000000000",
    );
    expect(() =>
      inline({ ...boxOnly(), specifics: [{ generic: "Box", args: [-2147483649] }] }),
    ).toThrow("inline.json: $.specifics[0].args[0]: must be a 32-bit signed integer");
  });

  it("rejects unknown names while checking", () => {
    const program = inline(
      boxOnly({ declaration: [{ name: "p", op: "pointer-type", pointee: "V" }] }),
    );
    expect(() => checkProgram(program)).toThrow(
      'inline.json: $.generics[0].declaration[0].pointee: unknown name "V"',
    );
  });

  it("rejects names declared twice in one generic", () => {
    const program = inline(
      boxOnly({ declaration: [{ name: "T", op: "pointer-type", pointee: "T" }] }),
    );
    expect(() => checkProgram(program)).toThrow(
      'inline.json: $.generics[0].declaration[0].name: duplicate name "T" in Box',
    );
  });

  it("rejects parameter types that are not types", () => {
    const program = inline(
      boxOnly({ declaration: [{ name: "x", op: "param", type: 3 }] }),
    );
    expect(() => checkProgram(program)).toThrow(
      'inline.json: $.generics[0].declaration[0].type: "3" is not a type',
    );
  });

  it("checks the argument count of class types in generic bodies", () => {
    const program = inline({
      generics: [
        { name: "Box", bindings: [{ name: "T", type: "type" }] },
        {
          name: "Pair",
          bindings: [
            { name: "T", type: "type" },
            { name: "U", type: "type" },
          ],
          declaration: [{ name: "boxed", op: "class-type", generic: "Box", args: ["T", "U"] }],
        },
      ],
    });
    expect(() => checkProgram(program)).toThrow(
      new ProgramError(
        "inline.json",
        "$.generics[1].declaration[0].args",
        "Box takes 1 arguments, received 2",
      ),
    );
  });

  it("checks the argument count of specifics", () => {
    const program = inline({
      ...boxOnly(),
      specifics: [{ generic: "Box", args: ["i32", "bool"] }],
    });
    expect(() => checkProgram(program)).toThrow(
      "inline.json: $.specifics[0].args: Box takes 1 arguments, received 2",
    );
  });
});

describe("resolving program specifics", () => {
  const declaredOnly = () =>
    inline({ ...boxOnly(), specifics: [{ generic: "Box", args: ["i32"] }] });

  it("reports a definition that is not available", () => {
    const program = declaredOnly();
    const checked = checkProgram(program);
    resolveSpecifics(checked, "definition");

    const start = program.source.indexOf('"Box"', program.source.indexOf('"specifics"'));
    expect(checked.context.diagnostics.diagnostics).toEqual([
      expect.objectContaining({
        code: "CK0003",
        message: "definition of instance1 is used before the generic is defined",
        span: { file: "inline.json", start, end: start + 5 },
      }),
    ]);
    expect(dumpProgram(checked).instances[1]?.declaration).toEqual(["i32"]);
  });

  it("stops at the requested region", () => {
    const checked = checkProgram(declaredOnly());
    resolveSpecifics(checked, "none");

    expect(dumpProgram(checked).instances[1]).toMatchObject({
      label: "Box(i32)",
      declaration: null,
      definition: null,
    });
    expect(checked.context.diagnostics.diagnostics).toEqual([]);
  });
});
