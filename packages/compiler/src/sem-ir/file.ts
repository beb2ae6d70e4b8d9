import { ConstantStore } from "./constant-store.js";
import { GenericInstanceStore } from "./generic-instance-store.js";
import { GenericStore } from "./generic-store.js";
import { InstBlockStore, InstStore } from "./inst-store.js";
import { MemUsage } from "./mem-usage.js";
import {
  isTypeConstant,
  seedBuiltinTypes,
  typeIdForConstant,
  type BuiltinTypes,
} from "./types.js";
import type { ConstantId, TypeId } from "./ids.js";

/** The semantic IR of one compilation unit. */
export class SemIrFile {
  readonly insts = new InstStore();
  readonly blocks = new InstBlockStore();
  readonly constants = new ConstantStore(this.insts);
  readonly instances = new GenericInstanceStore(this.blocks, this.constants);
  readonly generics = new GenericStore(this.blocks, this.instances);
  readonly builtins: BuiltinTypes = seedBuiltinTypes(this.constants);

  constructor(readonly name = "<anonymous>") {}

  isTypeConstant(constantId: ConstantId): boolean {
    return isTypeConstant({
      constantId,
      constants: this.constants,
      insts: this.insts,
      builtins: this.builtins,
    });
  }

  typeIdForConstant(constantId: ConstantId): TypeId {
    return typeIdForConstant({
      constantId,
      constants: this.constants,
      insts: this.insts,
      builtins: this.builtins,
    });
  }

  collectMemUsage(memUsage: MemUsage = new MemUsage(), label = ""): MemUsage {
    this.instances.collectMemUsage(
      memUsage,
      MemUsage.concatLabel(label, "generic_instances")
    );
    return memUsage;
  }
}
