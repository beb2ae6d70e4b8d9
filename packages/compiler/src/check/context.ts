import { DiagnosticEmitter, normalizeSpan, type SourceSpan } from "../diagnostics/index.js";
import { SemIrFile } from "../sem-ir/file.js";
import type { ConstantId, InstId } from "../sem-ir/ids.js";
import type { Inst } from "../sem-ir/inst.js";
import { GenericRegionStack } from "./generic-region-stack.js";
import { tryEvalInst } from "./eval.js";

export interface CheckContextInit {
  file?: SemIrFile;
  diagnostics?: DiagnosticEmitter;
}

/** State shared by the checking pipeline for one compilation unit. */
export class CheckContext {
  readonly file: SemIrFile;
  readonly diagnostics: DiagnosticEmitter;
  readonly genericRegions = new GenericRegionStack();

  constructor({ file, diagnostics }: CheckContextInit = {}) {
    this.file = file ?? new SemIrFile();
    this.diagnostics = diagnostics ?? new DiagnosticEmitter();
  }

  /**
   * Adds an instruction and records its constant value. Symbolic constants
   * seen for the first time join the eval block of the innermost open generic
   * region.
   */
  addInst(inst: Inst, span?: SourceSpan): InstId {
    const id = this.file.insts.add(inst, span);
    const value = tryEvalInst(this, id, inst);
    this.file.constants.setConstantValue(id, value);
    this.addGenericConstant(value);
    return id;
  }

  /** The canonical instruction of `instId`'s constant value. */
  constantInstOf(instId: InstId): InstId {
    return this.file.constants.getInstId(
      this.file.constants.getConstantValue(instId)
    );
  }

  spanOf(instId: InstId): SourceSpan {
    return normalizeSpan(this.file.insts.getSpan(instId), {
      file: this.file.name,
      start: 0,
      end: 0,
    });
  }

  private addGenericConstant(value: ConstantId): void {
    const region = this.genericRegions.peek();
    const { constants } = this.file;
    if (!region || !constants.isSymbolic(value)) {
      return;
    }
    if (constants.get(value).location) {
      return;
    }

    constants.setLocation(value, {
      generic: region.generic,
      index: { region: region.region, index: region.evalInsts.length },
    });
    region.evalInsts.push(constants.getInstId(value));
    region.constants.push(value);
  }
}
