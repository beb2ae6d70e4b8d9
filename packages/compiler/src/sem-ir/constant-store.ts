import {
  ConstantIds,
  INVALID_ID,
  isValidId,
  type ConstantId,
  type GenericId,
  type GenericInstIndex,
  type InstId,
} from "./ids.js";
import { instKey, type Inst } from "./inst.js";
import type { InstStore } from "./inst-store.js";
import { assertContract, contractViolation } from "./contracts.js";

export type ConstantPhase = "template" | "symbolic";

/** Where a symbolic constant's per-specific value can be found. */
export interface SymbolicConstantLocation {
  generic: GenericId;
  index: GenericInstIndex;
}

export interface ConstantRecord {
  /** The canonical instruction holding this constant's value. */
  instId: InstId;
  phase: ConstantPhase;
  /** Set once, when the constant is added to a generic's eval block. */
  location?: SymbolicConstantLocation;
}

/**
 * Interns constant values and tracks the constant value of every instruction.
 * Structurally equal constants share one canonical instruction, which is what
 * lets the instance table compare arguments by id.
 */
export class ConstantStore {
  private readonly records: ConstantRecord[] = [];
  private readonly byKey = new Map<string, ConstantId>();
  private readonly valuesByInst = new Map<InstId, ConstantId>();

  constructor(private readonly insts: InstStore) {}

  /** Returns the canonical constant for `inst`, adding it when new. */
  intern(inst: Inst, phase: ConstantPhase): ConstantId {
    const key = instKey(inst);
    const cached = this.byKey.get(key);
    if (typeof cached === "number") {
      return cached;
    }

    const instId = this.insts.add(inst);
    const id = this.records.length;
    this.records.push({ instId, phase });
    this.byKey.set(key, id);
    this.valuesByInst.set(instId, id);
    return id;
  }

  /**
   * Makes an existing instruction its own constant. Bindings use this: two
   * bindings that look alike are still distinct parameters.
   */
  adopt(instId: InstId, phase: ConstantPhase): ConstantId {
    const existing = this.valuesByInst.get(instId);
    if (typeof existing === "number" && isValidId(existing)) {
      return existing;
    }

    const id = this.records.length;
    this.records.push({ instId, phase });
    this.valuesByInst.set(instId, id);
    return id;
  }

  get(id: ConstantId): Readonly<ConstantRecord> {
    const record = this.records[id];
    if (!record) {
      return contractViolation(`constant ${id} does not exist`);
    }
    return record;
  }

  getInstId(id: ConstantId): InstId {
    return isValidId(id) ? this.get(id).instId : INVALID_ID;
  }

  isSymbolic(id: ConstantId): boolean {
    return isValidId(id) && this.get(id).phase === "symbolic";
  }

  isTemplate(id: ConstantId): boolean {
    return isValidId(id) && this.get(id).phase === "template";
  }

  /** The constant value of an instruction; instructions never classified are runtime values. */
  getConstantValue(instId: InstId): ConstantId {
    return this.valuesByInst.get(instId) ?? ConstantIds.notConstant;
  }

  setConstantValue(instId: InstId, value: ConstantId): void {
    this.valuesByInst.set(instId, value);
  }

  /** True when `instId` is the canonical instruction of some constant. */
  isCanonicalConstantInst(instId: InstId): boolean {
    const value = this.valuesByInst.get(instId);
    return (
      typeof value === "number" &&
      isValidId(value) &&
      this.get(value).instId === instId
    );
  }

  setLocation(id: ConstantId, location: SymbolicConstantLocation): void {
    const record = this.get(id);
    assertContract(
      record.phase === "symbolic",
      `constant ${id} is not symbolic and cannot be placed in an eval block`
    );
    assertContract(
      record.location === undefined,
      `constant ${id} already has an eval block location`
    );
    this.records[id] = { ...record, location };
  }

  /** Fills in the owning generic for constants recorded before it existed. */
  attachGeneric(id: ConstantId, generic: GenericId): void {
    const record = this.get(id);
    const location = record.location;
    if (!location) {
      return contractViolation(`constant ${id} has no eval block location`);
    }
    assertContract(
      !isValidId(location.generic),
      `constant ${id} already belongs to generic ${location.generic}`
    );
    this.records[id] = { ...record, location: { ...location, generic } };
  }

  get size(): number {
    return this.records.length;
  }
}
