import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import type { OutputFormat, ResolveMode, SemirCliConfig } from "./types.js";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../../package.json");
const version =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["text", "json", "msgpack"];
const RESOLVE_MODES: readonly ResolveMode[] = ["none", "declaration", "definition"];

const DEFAULT_PROGRAM = "./program.json";

const parseChoice =
  <T extends string>(label: string, choices: readonly T[]) =>
  (value: string): T => {
    const normalized = value.toLowerCase();
    const match = choices.find((choice) => choice === normalized);
    if (match) {
      return match;
    }
    throw new InvalidArgumentError(
      `invalid ${label} "${value}" (allowed: ${choices.join(", ")})`,
    );
  };

const createBaseCommand = ({
  name,
  description,
}: {
  name: string;
  description: string;
}): Command =>
  new Command()
    .name(name)
    .description(description)
    .version(version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command")
    .exitOverride();

type CliOptions = {
  format: OutputFormat;
  resolve: ResolveMode;
  memUsage?: boolean;
  color: boolean;
};

export const parseCliArgs = (argv: readonly string[]): SemirCliConfig => {
  const program = createBaseCommand({
    name: "semir",
    description: "Check generic programs and dump their instances",
  });

  program
    .argument("[program]", `JSON program to check (default: ${DEFAULT_PROGRAM})`)
    .option(
      "-f, --format <format>",
      `output format (${OUTPUT_FORMATS.join("|")})`,
      parseChoice("output format", OUTPUT_FORMATS),
      "text",
    )
    .option(
      "-r, --resolve <region>",
      `resolve requested specifics up to this region (${RESOLVE_MODES.join("|")})`,
      parseChoice("resolve mode", RESOLVE_MODES),
      "definition",
    )
    .option("--mem-usage", "append memory usage estimates")
    .option("--no-color", "print diagnostics without colors");

  program.parse(["node", "semir", ...argv]);
  const opts = program.opts<CliOptions>();
  const [programArg] = program.args;

  return {
    program: programArg ?? DEFAULT_PROGRAM,
    format: opts.format,
    resolve: opts.resolve,
    memUsage: opts.memUsage ?? false,
    color: opts.color,
  };
};

export const getConfigFromCli = (): SemirCliConfig =>
  parseCliArgs(process.argv.slice(2));
