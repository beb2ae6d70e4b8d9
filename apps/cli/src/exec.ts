import { CommanderError } from "commander";
import {
  DiagnosticError,
  diffCompilerPerfCounters,
  logCompilerPerfSummary,
  snapshotCompilerPerfCounters,
  type DiagnosticEmitter,
} from "@semir/compiler";
import { getConfig, type SemirCliConfig } from "./config/index.js";
import { formatCliDiagnostic } from "./diagnostics.js";
import { dumpProgram, formatDumpText, type ProgramDump } from "./dump.js";
import { printJson, printMsgPack } from "./output.js";
import { checkProgram, loadProgram, resolveSpecifics, ProgramError } from "./program.js";

export type CliRunResult = {
  dump: ProgramDump;
  source: string;
  diagnostics: DiagnosticEmitter;
  /** Memory usage as text, when requested. */
  memUsage?: string;
};

/** Loads, checks and resolves a program file without printing anything. */
export const runProgramFile = async (
  config: Pick<SemirCliConfig, "program" | "resolve" | "memUsage">,
): Promise<CliRunResult> => {
  const before = snapshotCompilerPerfCounters();
  const program = await loadProgram(config.program);
  const checked = checkProgram(program);
  resolveSpecifics(checked, config.resolve);
  const dump = dumpProgram(checked, { memUsage: config.memUsage });

  logCompilerPerfSummary({
    label: config.program,
    counters: diffCompilerPerfCounters({
      before,
      after: snapshotCompilerPerfCounters(),
    }),
    diagnostics: dump.diagnostics.length,
  });

  return {
    dump,
    source: program.source,
    diagnostics: checked.context.diagnostics,
    memUsage: config.memUsage
      ? checked.context.file.collectMemUsage().format()
      : undefined,
  };
};

export const exec = () => main().catch(errorHandler);

async function main() {
  const config = getConfig();
  const { dump, source, diagnostics, memUsage } = await runProgramFile(config);

  dump.diagnostics.forEach((diagnostic) => {
    console.error(formatCliDiagnostic(diagnostic, { source, color: config.color }));
  });

  if (config.format === "json") {
    printJson(dump);
  } else if (config.format === "msgpack") {
    printMsgPack(dump);
  } else {
    console.log(formatDumpText(dump));
    if (memUsage) {
      console.log(`\n${memUsage}`);
    }
  }

  diagnostics.throwIfErrors();
}

function errorHandler(error: unknown) {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode;
    return;
  }

  // Diagnostics were already printed with their source.
  if (error instanceof DiagnosticError) {
    process.exitCode = 1;
    return;
  }

  if (error instanceof ProgramError) {
    console.error(error.message);
    process.exit(1);
  }

  console.error(error);
  process.exit(1);
}
