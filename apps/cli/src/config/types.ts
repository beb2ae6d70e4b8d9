export type OutputFormat = "text" | "json" | "msgpack";

/** How far each requested specific is resolved before the dump. */
export type ResolveMode = "none" | "declaration" | "definition";

export type SemirCliConfig = {
  /** Path of the JSON program to check. */
  program: string;
  format: OutputFormat;
  resolve: ResolveMode;
  /** Append memory usage estimates to the dump. */
  memUsage: boolean;
  /** Colorize diagnostics on stderr. */
  color: boolean;
};
