import { describe, expect, it } from "vitest";
import {
  ArrayAssignmentInstruction,
  AssignmentInstruction,
  BinaryOpInstruction,
  CastInstruction,
  MethodCallInstruction,
  ReturnInstruction,
  TACInstructionKind,
} from "../../../src/analyzer/ir/tac_instruction.js";
import {
  createConstant,
  createTemporary,
  createVariable,
} from "../../../src/analyzer/ir/tac_operand.js";
import {
  ObjectType,
  PrimitiveTypes,
} from "../../../src/analyzer/ir/type_symbols.js";

const a = createVariable("a", ObjectType);
const b = createVariable("b", ObjectType);
const t2 = createTemporary(2, ObjectType);
const one = createConstant(1, PrimitiveTypes.int32);

describe("TAC instructions", () => {
  it("renders definitions with their destination", () => {
    expect(new AssignmentInstruction(a, b).toString()).toBe("a = b");
    expect(new BinaryOpInstruction(t2, a, "+", one).toString()).toBe(
      "t2 = a + 1",
    );
    expect(new CastInstruction(b, t2).toString()).toBe("b = cast t2");
    expect(
      new MethodCallInstruction(t2, a, "get", [one, b]).toString(),
    ).toBe("t2 = call a.get(1, b)");
  });

  it("renders stores and returns", () => {
    expect(new ArrayAssignmentInstruction(a, one, b).toString()).toBe(
      "a[1] = b",
    );
    expect(new ReturnInstruction(t2).toString()).toBe("return t2");
  });

  it("tags every instance with its kind", () => {
    const inst = new BinaryOpInstruction(t2, a, "+", one);
    expect(inst.kind).toBe(TACInstructionKind.BinaryOp);
  });
});
