import {
  INVALID_ID,
  type ConstantId,
  type GenericId,
  type GenericRegion,
  type InstId,
} from "../sem-ir/ids.js";
import { contractViolation } from "../sem-ir/contracts.js";

/** A generic region whose checking is in progress. */
export interface OpenGenericRegion {
  region: GenericRegion;
  /** Unset while checking a declaration, since the generic is created at its end. */
  generic: GenericId;
  bindings: InstId[];
  /** Canonical instructions of the region's symbolic constants, in eval order. */
  evalInsts: InstId[];
  constants: ConstantId[];
}

/**
 * Tracks the generic regions being checked. The innermost region collects the
 * symbolic constants that become its eval block.
 */
export class GenericRegionStack {
  private readonly regions: OpenGenericRegion[] = [];

  push(region: GenericRegion, generic: GenericId = INVALID_ID): void {
    this.regions.push({
      region,
      generic,
      bindings: [],
      evalInsts: [],
      constants: [],
    });
  }

  pop(): OpenGenericRegion {
    const top = this.regions.pop();
    if (!top) {
      return contractViolation("generic region stack underflow");
    }
    return top;
  }

  peek(): OpenGenericRegion | undefined {
    return this.regions.at(-1);
  }

  get depth(): number {
    return this.regions.length;
  }
}
