import { describe, expect, it } from "vitest";
import { ConstantIds, INVALID_ID, TypeIds } from "../ids.js";
import {
  bindingArgument,
  getConstantInInstance,
  getConstantValueInInstance,
  getTypeInInstance,
} from "../substitution.js";
import { createPairGeneric, type PairGenericFixture } from "./support/pair-generic.js";

const addBox = ({ file }: PairGenericFixture) => {
  const { insts, blocks, constants, generics, builtins } = file;
  const declId = insts.add({ kind: "entity-decl", entity: "class", name: "Box" });
  const v = insts.add({
    kind: "bind-symbolic-name",
    name: "V",
    bindIndex: 0,
    type: builtins.type,
  });
  constants.adopt(v, "symbolic");
  const genericId = generics.create({ declId, bindingsId: blocks.addCanonical([v]) });
  const pointerToV = constants.intern({ kind: "pointer-type", pointee: v }, "symbolic");
  constants.setLocation(pointerToV, {
    generic: genericId,
    index: { region: "declaration", index: 0 },
  });
  return { genericId, v, pointerToV };
};

describe("substitution queries", () => {
  it("reads unknown before the region is resolved", () => {
    const { file, instanceOf, pointerToT } = createPairGeneric();
    const id = instanceOf(file.builtins.i32, file.builtins.bool);

    expect(getConstantInInstance(file, id, pointerToT)).toBe(ConstantIds.invalid);
    expect(getTypeInInstance(file, id, pointerToT)).toBe(TypeIds.invalid);
  });

  it("reads the value block once the region is resolved", () => {
    const { file, instanceOf, pointerToT } = createPairGeneric();
    const { constants, builtins } = file;
    const id = instanceOf(builtins.i32, builtins.bool);
    const pointerToI32 = constants.intern(
      { kind: "pointer-type", pointee: constants.getInstId(builtins.i32) },
      "template"
    );

    file.instances.setValueBlock(id, "declaration", [pointerToI32]);

    expect(getConstantInInstance(file, id, pointerToT)).toBe(pointerToI32);
    expect(getTypeInInstance(file, id, pointerToT)).toBe(pointerToI32);
  });

  it("reads unknown for a slot missing from the value block", () => {
    const { file, instanceOf, pointerToT } = createPairGeneric();
    const id = instanceOf(file.builtins.bool, file.builtins.bool);
    file.instances.setValueBlock(id, "declaration", []);

    expect(getConstantInInstance(file, id, pointerToT)).toBe(ConstantIds.invalid);
  });

  it("passes through template values, sentinels and invalid instances", () => {
    const { file, instanceOf, pointerToT } = createPairGeneric();
    const id = instanceOf(file.builtins.i32, file.builtins.bool);

    expect(getConstantInInstance(file, id, file.builtins.i32)).toBe(file.builtins.i32);
    expect(getConstantInInstance(file, id, ConstantIds.notConstant)).toBe(
      ConstantIds.notConstant
    );
    expect(getConstantInInstance(file, id, ConstantIds.error)).toBe(ConstantIds.error);
    expect(getConstantInInstance(file, INVALID_ID, pointerToT)).toBe(pointerToT);
  });

  it("maps a binding to the instance's argument", () => {
    const { file, instanceOf, tConstant, uConstant } = createPairGeneric();
    const { i32, bool } = file.builtins;
    const id = instanceOf(i32, bool);

    expect(getConstantInInstance(file, id, tConstant)).toBe(i32);
    expect(getConstantInInstance(file, id, uConstant)).toBe(bool);
    expect(getTypeInInstance(file, id, tConstant)).toBe(i32);
  });

  it("maps a binding to itself in the self instance", () => {
    const { file, genericId, tConstant } = createPairGeneric();
    const selfId = file.generics.getSelfInstance(genericId);

    expect(getConstantInInstance(file, selfId, tConstant)).toBe(tConstant);
  });

  it("leaves constants of another generic unchanged", () => {
    const fixture = createPairGeneric();
    const { file, instanceOf } = fixture;
    const box = addBox(fixture);
    const id = instanceOf(file.builtins.i32, file.builtins.bool);

    expect(getConstantInInstance(file, id, box.pointerToV)).toBe(box.pointerToV);
    expect(bindingArgument(file, id, box.v)).toBeUndefined();
  });

  it("reads runtime instructions as not constant", () => {
    const { file, instanceOf, declId, t } = createPairGeneric();
    const id = instanceOf(file.builtins.i32, file.builtins.bool);

    expect(getConstantValueInInstance(file, id, declId)).toBe(ConstantIds.notConstant);
    expect(getConstantValueInInstance(file, id, t)).toBe(file.builtins.i32);
    expect(bindingArgument(file, id, declId)).toBeUndefined();
  });
});
