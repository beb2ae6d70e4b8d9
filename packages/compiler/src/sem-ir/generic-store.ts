import {
  INVALID_ID,
  formatGenericId,
  formatInstBlockId,
  formatInstId,
  isValidId,
  type GenericId,
  type GenericInstanceId,
  type GenericRegion,
  type InstBlockId,
  type InstId,
} from "./ids.js";
import type { InstBlockStore } from "./inst-store.js";
import type { GenericInstanceStore } from "./generic-instance-store.js";
import { UNSET, setOnce, type WriteOnce } from "./write-once.js";
import { assertContract, contractViolation } from "./contracts.js";

/**
 * A generic entity, such as a generic class, interface or function. Covers
 * both checked and template generics.
 */
export interface Generic {
  /** The first declaration of the generic entity. */
  readonly declId: InstId;
  /**
   * Canonical block of the compile-time bindings in this generic scope. A
   * binding's position here matches its `bindIndex`.
   */
  readonly bindingsId: InstBlockId;
  /**
   * The instance where every parameter's argument is the parameter itself:
   * the self instance of `Vector(T:! type)` is `Vector(T)`.
   */
  readonly selfInstanceId: GenericInstanceId;
  /** Eval block for the declaration region, set when that region is finished. */
  declaration: WriteOnce<InstBlockId>;
  /** Eval block for the definition region, set when that region is finished. */
  definition: WriteOnce<InstBlockId>;
}

export const formatGeneric = (generic: Readonly<Generic>): string =>
  `{decl: ${formatInstId(generic.declId)}, bindings: ${formatInstBlockId(generic.bindingsId)}}`;

type GenericRecord = Omit<Generic, "selfInstanceId"> & {
  selfInstanceId: GenericInstanceId;
};

export class GenericStore {
  private readonly generics: GenericRecord[] = [];

  constructor(
    private readonly blocks: InstBlockStore,
    private readonly instances: GenericInstanceStore
  ) {
    instances.bindGenerics({
      has: (id) => this.generics[id] !== undefined,
      bindingCount: (id) => this.bindingCount(id),
    });
  }

  /** Adds a generic and registers its self instance. */
  create({
    declId,
    bindingsId,
  }: {
    declId: InstId;
    bindingsId: InstBlockId;
  }): GenericId {
    assertContract(
      this.blocks.isCanonical(bindingsId),
      () => `bindings block ${bindingsId} is not canonical`
    );

    const id = this.generics.length;
    const record: GenericRecord = {
      declId,
      bindingsId,
      selfInstanceId: INVALID_ID,
      declaration: UNSET,
      definition: UNSET,
    };
    // The record must exist before the self instance is added, since the
    // instance table checks the argument count against it.
    this.generics.push(record);
    record.selfInstanceId = this.instances.getOrAdd(id, bindingsId);
    return id;
  }

  get(id: GenericId): Readonly<Generic> {
    return this.ensureGeneric(id);
  }

  has(id: GenericId): boolean {
    return isValidId(id) && this.generics[id] !== undefined;
  }

  bindingCount(id: GenericId): number {
    return this.blocks.get(this.ensureGeneric(id).bindingsId).length;
  }

  getEvalBlock(id: GenericId, region: GenericRegion): WriteOnce<InstBlockId> {
    return this.ensureGeneric(id)[region];
  }

  setEvalBlock(id: GenericId, region: GenericRegion, blockId: InstBlockId): void {
    const generic = this.ensureGeneric(id);
    assertContract(
      generic[region].state === "unset",
      () => `${region} region of ${formatGenericId(id)} is already sealed`
    );
    generic[region] = setOnce(blockId);
  }

  /** The self instance of a generic, or an invalid id for an invalid generic. */
  getSelfInstance(id: GenericId): GenericInstanceId {
    return isValidId(id) ? this.ensureGeneric(id).selfInstanceId : INVALID_ID;
  }

  private ensureGeneric(id: GenericId): GenericRecord {
    const generic = this.generics[id];
    if (!generic) {
      return contractViolation(`generic ${id} does not exist`);
    }
    return generic;
  }

  get size(): number {
    return this.generics.length;
  }

  entries(): Iterable<[GenericId, Readonly<Generic>]> {
    return this.generics.map(
      (generic, id): [GenericId, Readonly<Generic>] => [id, generic]
    );
  }
}
