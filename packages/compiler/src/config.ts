const readEnv = (name: string): string | undefined => process.env[name];

const parseFlag = (raw: string | undefined, fallback: boolean): boolean => {
  if (raw === undefined) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "") return fallback;
  return normalized === "1" || normalized === "true" || normalized === "yes";
};

export const CONTRACT_CHECKS_ENV = "SEMIR_CONTRACT_CHECKS";
export const COMPILER_PERF_ENV = "SEMIR_COMPILER_PERF";

export interface CompilerEnvConfig {
  /** Assert caller contracts (argument canonicality, write-once fields). */
  contractChecks: boolean;
  /** Collect and report perf counters on stderr. */
  perf: boolean;
}

export const readCompilerEnvConfig = (): CompilerEnvConfig => ({
  contractChecks: parseFlag(readEnv(CONTRACT_CHECKS_ENV), true),
  perf: parseFlag(readEnv(COMPILER_PERF_ENV), false),
});

let config: CompilerEnvConfig | undefined = undefined;

export const getCompilerConfig = (): CompilerEnvConfig => {
  if (config) {
    return config;
  }
  config = readCompilerEnvConfig();
  return config;
};

/** Drops the cached config so the next read sees the current environment. */
export const resetCompilerConfig = (): void => {
  config = undefined;
};
