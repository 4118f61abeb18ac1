import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { analyzeAliases } from "../../../src/analyzer/alias/alias_analysis.js";
import {
  AggregateProgramLoadError,
  ProgramLoadError,
} from "../../../src/analyzer/errors/alias_errors.js";
import {
  loadProgramFile,
  parseProgram,
} from "../../../src/analyzer/ir/program_loader.js";
import { TACInstructionKind } from "../../../src/analyzer/ir/tac_instruction.js";
import { TACOperandKind } from "../../../src/analyzer/ir/tac_operand.js";

const fixture = (name: string) =>
  fileURLToPath(new URL(`../../fixtures/programs/${name}`, import.meta.url));

const loadError = (text: string, source?: string) => {
  try {
    parseProgram(text, source);
  } catch (err) {
    if (err instanceof AggregateProgramLoadError) return err;
    throw err;
  }
  throw new Error("expected the program to be rejected");
};

describe("parseProgram", () => {
  it("builds instructions from their JSON form", () => {
    const program = parseProgram(
      JSON.stringify({
        instructions: [
          {
            op: "call",
            dest: { var: "a", type: "object" },
            func: "alloc",
            args: [],
          },
          {
            op: "copy",
            dest: { temp: 0, type: "object" },
            src: { var: "a", type: "object" },
          },
          {
            op: "setProperty",
            object: { temp: 0, type: "object" },
            property: "x",
            value: { const: 1, type: "int32" },
          },
          {
            op: "arrayGet",
            dest: { var: "e", type: "object" },
            array: { var: "xs", type: "object[]", param: true },
            index: { const: 0, type: "int32" },
          },
          {
            op: "methodCall",
            object: { var: "e", type: "object" },
            method: "touch",
            args: [{ const: "hi", type: "string" }],
          },
          { op: "return" },
        ],
      }),
    );

    expect(program.map((inst) => inst.toString())).toEqual([
      "a = call alloc()",
      "t0 = a",
      "t0.x = 1",
      "e = xs[0]",
      'call e.touch("hi")',
      "return",
    ]);
    expect(program.map((inst) => inst.kind)).toEqual([
      TACInstructionKind.Call,
      TACInstructionKind.Copy,
      TACInstructionKind.PropertySet,
      TACInstructionKind.ArrayAccess,
      TACInstructionKind.MethodCall,
      TACInstructionKind.Return,
    ]);

    const arrayGet = program[3];
    if (arrayGet.kind !== TACInstructionKind.ArrayAccess) return;
    const array = arrayGet.array;
    expect(array.kind).toBe(TACOperandKind.Variable);
    if (array.kind !== TACOperandKind.Variable) return;
    expect(array.isParameter).toBe(true);
    expect(array.type.name).toBe("object[]");
    expect(array.type.isReference).toBe(true);
  });

  it("reports every problem at once", () => {
    const err = loadError(
      JSON.stringify({
        instructions: [
          {
            op: "copy",
            dest: { const: 1, type: "int32" },
            src: { var: "a", type: "widget" },
          },
          { op: "jump" },
          42,
        ],
      }),
      "test.json",
    );

    expect(err.errors.map((e) => e.code)).toEqual([
      "InvalidOperand",
      "UnknownType",
      "InvalidInstruction",
      "InvalidInstruction",
    ]);
    expect(err.message).toBe(
      [
        "Loading test.json failed with 4 error(s):",
        "- [InvalidOperand] instructions[0].dest: destination cannot be a constant",
        '- [UnknownType] instructions[0].src.type: unknown type "widget"',
        '- [InvalidInstruction] instructions[1].op: unknown op "jump"',
        "- [InvalidInstruction] instructions[2]: expected an object",
      ].join("\n"),
    );
  });

  it("rejects malformed JSON", () => {
    const err = loadError("{", "bad.json");
    expect(err.errors).toHaveLength(1);
    expect(err.errors[0]).toBeInstanceOf(ProgramLoadError);
    expect(err.errors[0].code).toBe("InvalidJson");
    expect(err.errors[0].path).toBe("$");
  });

  it("rejects a document without an instruction list", () => {
    const err = loadError("[]");
    expect(err.errors.map((e) => e.path)).toEqual(["$"]);
    expect(err.message.split("\n")[0]).toBe(
      "Loading <inline> failed with 1 error(s):",
    );
  });

  it("rejects operands missing their identity", () => {
    const err = loadError(
      JSON.stringify({
        instructions: [
          { op: "call", func: "f", args: [{ type: "object" }] },
        ],
      }),
    );
    expect(err.errors.map((e) => e.path)).toEqual(["instructions[0].args[0]"]);
    expect(err.errors[0].code).toBe("InvalidOperand");
  });
});

describe("loadProgramFile", () => {
  it("loads and analyzes a program from disk", () => {
    const program = loadProgramFile(fixture("shared_pointee.json"));
    expect(program).toHaveLength(7);

    const analysis = analyzeAliases(program, { pureFunctions: ["alloc"] });
    const p1 = analysis.findOperand("p1");
    const p2 = analysis.findOperand("p2");
    const other = analysis.findOperand("other");
    expect(p1).toBeDefined();
    expect(p2).toBeDefined();
    expect(other).toBeDefined();
    if (!p1 || !p2 || !other) return;

    expect(analysis.mayAlias(p1, p2)).toBe(true);
    expect(analysis.mayAlias(p1, other)).toBe(false);
    expect(analysis.hasWriters(p2)).toBe(true);
    expect(analysis.hasWriters(other)).toBe(false);
    expect(analysis.getWildcardWriters().size).toBe(0);
  });
});
