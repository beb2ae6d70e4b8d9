import { getCompilerConfig } from "./config.js";

type CompilerPerfCounterSnapshot = Map<string, number>;

type CompilerPerfSummary = {
  label: string;
  counters: Readonly<Record<string, number>>;
  diagnostics: number;
};

const counters = new Map<string, number>();

const toSortedRecord = (
  entries: ReadonlyMap<string, number>,
): Record<string, number> =>
  Object.fromEntries(
    Array.from(entries.entries()).sort(([left], [right]) =>
      left.localeCompare(right),
    ),
  );

export const isCompilerPerfEnabled = (): boolean => getCompilerConfig().perf;

export const incrementCompilerPerfCounter = (
  name: string,
  amount = 1,
): void => {
  if (!isCompilerPerfEnabled() || amount === 0) {
    return;
  }
  counters.set(name, (counters.get(name) ?? 0) + amount);
};

export const snapshotCompilerPerfCounters = (): CompilerPerfCounterSnapshot =>
  isCompilerPerfEnabled() ? new Map(counters) : new Map();

export const diffCompilerPerfCounters = ({
  before,
  after,
}: {
  before: ReadonlyMap<string, number>;
  after: ReadonlyMap<string, number>;
}): Record<string, number> => {
  if (!isCompilerPerfEnabled()) {
    return {};
  }

  const keys = new Set<string>([...before.keys(), ...after.keys()]);
  const delta = new Map<string, number>();
  keys.forEach((key) => {
    const diff = (after.get(key) ?? 0) - (before.get(key) ?? 0);
    if (diff !== 0) {
      delta.set(key, diff);
    }
  });
  return toSortedRecord(delta);
};

export const logCompilerPerfSummary = ({
  label,
  counters,
  diagnostics,
}: CompilerPerfSummary): void => {
  if (!isCompilerPerfEnabled()) {
    return;
  }

  console.error(
    `[semir:perf] ${JSON.stringify({ label, diagnostics, counters })}`,
  );
};
