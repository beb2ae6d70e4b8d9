import { stdout } from "node:process";
import { encode } from "@msgpack/msgpack";

const CIRCULAR_REFERENCE = "[Circular]";

const hasToJSON = (value: object): value is { toJSON: () => unknown } =>
  "toJSON" in value && typeof value.toJSON === "function";

const normalizeOutput = ({
  value,
  ancestors = new WeakSet(),
}: {
  value: unknown;
  ancestors?: WeakSet<object>;
}): unknown => {
  if (!value || typeof value !== "object") {
    return value;
  }
  if (ancestors.has(value)) {
    return CIRCULAR_REFERENCE;
  }

  ancestors.add(value);
  try {
    const normalize = (entry: unknown) => normalizeOutput({ value: entry, ancestors });
    if (hasToJSON(value)) {
      return normalize(value.toJSON());
    }
    if (value instanceof Map) {
      return Object.fromEntries(
        Array.from(value.entries()).map(([key, entry]) => [String(key), normalize(entry)]),
      );
    }
    if (value instanceof Set || Array.isArray(value)) {
      return Array.from(value).map(normalize);
    }
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, entry]) => entry !== undefined)
        .map(([key, entry]) => [key, normalize(entry)]),
    );
  } finally {
    ancestors.delete(value);
  }
};

export const stringifyOutput = (value: unknown): string =>
  JSON.stringify(normalizeOutput({ value }), undefined, 2);

export const printJson = (value: unknown): void => {
  console.log(stringifyOutput(value));
};

/** Writes `value` to stdout as a single MessagePack document. */
export const printMsgPack = (value: unknown): void => {
  stdout.write(encode(normalizeOutput({ value })));
};
