import {
  formatGenericId,
  formatGenericInstanceId,
  formatInstBlockId,
  type ConstantId,
  type GenericId,
  type GenericInstanceId,
  type GenericRegion,
  type InstBlockId,
  type InstId,
} from "./ids.js";
import type { ConstantStore } from "./constant-store.js";
import type { InstBlockStore } from "./inst-store.js";
import {
  BYTES_PER_MAP_ENTRY,
  BYTES_PER_OBJECT_HEADER,
  BYTES_PER_STRING_CHAR,
  MemUsage,
} from "./mem-usage.js";
import { UNSET, setOnce, type WriteOnce } from "./write-once.js";
import { assertContract, contractViolation } from "./contracts.js";
import { incrementCompilerPerfCounter } from "../perf.js";

/** Substituted constant values, aligned with the generic's eval block. */
export type ValueBlock = readonly ConstantId[];

/**
 * One concrete instantiation of a generic ("specific"). For each construct in
 * the generic that depends on a compile-time parameter, its value blocks hold
 * the corresponding non-generic value.
 */
export interface GenericInstance {
  /** The generic that this is an instance of. */
  readonly genericId: GenericId;
  /** Canonical argument block, aligned with the generic's bindings. */
  readonly argsId: InstBlockId;
  /** Set when the declaration region of this specific is resolved. */
  declaration: WriteOnce<ValueBlock>;
  /** Set when the definition region of this specific is resolved. */
  definition: WriteOnce<ValueBlock>;
}

export interface GenericInstanceDumpEntry {
  id: string;
  generic: string;
  args: string;
}

/** What the instance table needs to know about generics. */
export interface GenericArity {
  has(id: GenericId): boolean;
  bindingCount(id: GenericId): number;
}

export const formatGenericInstance = (instance: Readonly<GenericInstance>): string =>
  `{generic: ${formatGenericId(instance.genericId)}, args: ${formatInstBlockId(instance.argsId)}}`;

const instanceKey = (genericId: GenericId, args: readonly InstId[]): string =>
  `${genericId}:${args.join(",")}`;

/** Storage for deduplicated instances of generics. */
export class GenericInstanceStore {
  private readonly instances: GenericInstance[] = [];
  private readonly lookup = new Map<string, GenericInstanceId>();
  private arity?: GenericArity;

  constructor(
    private readonly blocks: InstBlockStore,
    private readonly constants: ConstantStore
  ) {}

  /** Connects the generic store once it exists; the two reference each other. */
  bindGenerics(arity: GenericArity): void {
    assertContract(!this.arity, "instance store is already bound to generics");
    this.arity = arity;
  }

  /**
   * Gets the existing instance of `genericId` for `argsId`, or adds one. The
   * argument block must be canonical and hold canonical constant
   * instructions, one per binding.
   */
  getOrAdd(genericId: GenericId, argsId: InstBlockId): GenericInstanceId {
    const args = this.blocks.get(argsId);
    const key = instanceKey(genericId, args);
    const existing = this.lookup.get(key);
    if (typeof existing === "number") {
      incrementCompilerPerfCounter("generic-instance.hit");
      return existing;
    }

    this.checkArgs(genericId, argsId, args);
    incrementCompilerPerfCounter("generic-instance.miss");
    const id = this.instances.length;
    this.instances.push({
      genericId,
      argsId,
      declaration: UNSET,
      definition: UNSET,
    });
    this.lookup.set(key, id);
    return id;
  }

  private checkArgs(
    genericId: GenericId,
    argsId: InstBlockId,
    args: readonly InstId[]
  ): void {
    const arity = this.arity;
    if (!arity) {
      return contractViolation("instance store is not bound to generics");
    }
    assertContract(arity.has(genericId), () => `generic ${genericId} does not exist`);
    assertContract(
      this.blocks.isCanonical(argsId),
      () => `argument block ${argsId} is not canonical`
    );
    assertContract(
      args.length === arity.bindingCount(genericId),
      () =>
        `generic ${genericId} takes ${arity.bindingCount(genericId)} arguments, received ${args.length}`
    );
    args.forEach((arg, index) =>
      assertContract(
        this.constants.isCanonicalConstantInst(arg),
        () => `argument ${index} (instruction ${arg}) is not a canonical constant`
      )
    );
  }

  get(id: GenericInstanceId): Readonly<GenericInstance> {
    return this.ensureInstance(id);
  }

  getValueBlock(id: GenericInstanceId, region: GenericRegion): WriteOnce<ValueBlock> {
    return this.ensureInstance(id)[region];
  }

  setValueBlock(
    id: GenericInstanceId,
    region: GenericRegion,
    values: ValueBlock
  ): void {
    const instance = this.ensureInstance(id);
    assertContract(
      instance[region].state === "unset",
      () => `${region} region of instance ${id} is already resolved`
    );
    instance[region] = setOnce(Object.freeze([...values]));
  }

  private ensureInstance(id: GenericInstanceId): GenericInstance {
    const instance = this.instances[id];
    if (!instance) {
      return contractViolation(`generic instance ${id} does not exist`);
    }
    return instance;
  }

  get size(): number {
    return this.instances.length;
  }

  entries(): Iterable<[GenericInstanceId, Readonly<GenericInstance>]> {
    return this.instances.map(
      (instance, id): [GenericInstanceId, Readonly<GenericInstance>] => [id, instance]
    );
  }

  /** Structured view of the table for debugging tools; not a stable format. */
  dump(): GenericInstanceDumpEntry[] {
    return this.instances.map((instance, id) => ({
      id: formatGenericInstanceId(id),
      generic: formatGenericId(instance.genericId),
      args: formatInstBlockId(instance.argsId),
    }));
  }

  collectMemUsage(memUsage: MemUsage, label: string): void {
    memUsage.addArray(
      MemUsage.concatLabel(label, "instances"),
      this.instances.length,
      BYTES_PER_OBJECT_HEADER + 4 * 8
    );
    let lookupBytes = 0;
    this.lookup.forEach((_, key) => {
      lookupBytes += BYTES_PER_MAP_ENTRY + key.length * BYTES_PER_STRING_CHAR;
    });
    memUsage.add(MemUsage.concatLabel(label, "lookup"), lookupBytes);
  }
}
