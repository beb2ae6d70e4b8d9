import { getConfigFromCli } from "./arg-parser.js";
import type { SemirCliConfig } from "./types.js";

export type { OutputFormat, ResolveMode, SemirCliConfig } from "./types.js";

let config: SemirCliConfig | undefined = undefined;

export const getConfig = (): SemirCliConfig => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
