import type { SourceSpan } from "../diagnostics/index.js";
import type { InstBlockId, InstId } from "./ids.js";
import type { Inst } from "./inst.js";
import { contractViolation } from "./contracts.js";

export class InstStore {
  private readonly insts: Inst[] = [];
  private readonly spans = new Map<InstId, SourceSpan>();

  add(inst: Inst, span?: SourceSpan): InstId {
    const id = this.insts.length;
    this.insts.push(Object.freeze({ ...inst }));
    if (span) {
      this.spans.set(id, span);
    }
    return id;
  }

  get(id: InstId): Readonly<Inst> {
    const inst = this.insts[id];
    if (!inst) {
      return contractViolation(`instruction ${id} does not exist`);
    }
    return inst;
  }

  has(id: InstId): boolean {
    return id >= 0 && id < this.insts.length;
  }

  getSpan(id: InstId): SourceSpan | undefined {
    return this.spans.get(id);
  }

  get size(): number {
    return this.insts.length;
  }
}

const blockKey = (ids: readonly InstId[]): string => ids.join(",");

/**
 * Blocks are ordered lists of instruction ids. Canonical blocks are
 * deduplicated by content, so two canonical blocks with the same elements are
 * the same block.
 */
export class InstBlockStore {
  private readonly blocks: (readonly InstId[])[] = [];
  private readonly canonical = new Map<string, InstBlockId>();
  private readonly canonicalIds = new Set<InstBlockId>();

  add(ids: readonly InstId[]): InstBlockId {
    const id = this.blocks.length;
    this.blocks.push(Object.freeze([...ids]));
    return id;
  }

  addCanonical(ids: readonly InstId[]): InstBlockId {
    const key = blockKey(ids);
    const existing = this.canonical.get(key);
    if (typeof existing === "number") {
      return existing;
    }

    const id = this.add(ids);
    this.canonical.set(key, id);
    this.canonicalIds.add(id);
    return id;
  }

  get(id: InstBlockId): readonly InstId[] {
    const block = this.blocks[id];
    if (!block) {
      return contractViolation(`instruction block ${id} does not exist`);
    }
    return block;
  }

  isCanonical(id: InstBlockId): boolean {
    return this.canonicalIds.has(id);
  }

  get size(): number {
    return this.blocks.length;
  }
}
