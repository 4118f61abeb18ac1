/**
 * Loads TAC programs from their JSON description
 */

import fs from "node:fs";
import { ProgramLoadError } from "../errors/alias_errors.js";
import { ErrorCollector } from "../errors/error_collector.js";
import {
  ArrayAccessInstruction,
  ArrayAssignmentInstruction,
  AssignmentInstruction,
  BinaryOpInstruction,
  CallInstruction,
  CastInstruction,
  CopyInstruction,
  MethodCallInstruction,
  PropertyGetInstruction,
  PropertySetInstruction,
  ReturnInstruction,
  type TACInstruction,
} from "./tac_instruction.js";
import {
  type ConstantValue,
  createConstant,
  createTemporary,
  createVariable,
  type TACOperand,
  TACOperandKind,
} from "./tac_operand.js";
import {
  ArrayTypeSymbol,
  isPrimitiveTypeName,
  ObjectType,
  PrimitiveTypes,
  type TypeSymbol,
} from "./type_symbols.js";

type JsonObject = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isConstantValue = (value: unknown): value is ConstantValue =>
  value === null ||
  typeof value === "number" ||
  typeof value === "string" ||
  typeof value === "boolean";

class ProgramReader {
  constructor(private readonly errors: ErrorCollector) {}

  readProgram(raw: unknown): TACInstruction[] {
    if (!isRecord(raw) || !Array.isArray(raw.instructions)) {
      this.fail("InvalidInstruction", "expected { instructions: [...] }", "$");
      return [];
    }
    const entries: unknown[] = raw.instructions;
    const instructions: TACInstruction[] = [];
    for (let i = 0; i < entries.length; i++) {
      const inst = this.readInstruction(entries[i], `instructions[${i}]`);
      if (inst) instructions.push(inst);
    }
    return instructions;
  }

  private readInstruction(
    raw: unknown,
    path: string,
  ): TACInstruction | undefined {
    if (!isRecord(raw)) {
      this.fail("InvalidInstruction", "expected an object", path);
      return undefined;
    }
    const op = raw.op;
    switch (op) {
      case "assign":
      case "copy":
      case "cast": {
        const dest = this.readDest(raw.dest, `${path}.dest`);
        const src = this.readOperand(raw.src, `${path}.src`);
        if (!dest || !src) return undefined;
        if (op === "assign") return new AssignmentInstruction(dest, src);
        if (op === "copy") return new CopyInstruction(dest, src);
        return new CastInstruction(dest, src);
      }
      case "binary": {
        const dest = this.readDest(raw.dest, `${path}.dest`);
        const left = this.readOperand(raw.left, `${path}.left`);
        const operator = this.readString(raw.operator, `${path}.operator`);
        const right = this.readOperand(raw.right, `${path}.right`);
        if (!dest || !left || operator === undefined || !right) {
          return undefined;
        }
        return new BinaryOpInstruction(dest, left, operator, right);
      }
      case "call": {
        const dest = this.readOptionalDest(raw.dest, `${path}.dest`);
        const func = this.readString(raw.func, `${path}.func`);
        const args = this.readOperandList(raw.args, `${path}.args`);
        if (dest === null || func === undefined || !args) return undefined;
        return new CallInstruction(dest, func, args);
      }
      case "methodCall": {
        const dest = this.readOptionalDest(raw.dest, `${path}.dest`);
        const object = this.readOperand(raw.object, `${path}.object`);
        const method = this.readString(raw.method, `${path}.method`);
        const args = this.readOperandList(raw.args, `${path}.args`);
        if (dest === null || !object || method === undefined || !args) {
          return undefined;
        }
        return new MethodCallInstruction(dest, object, method, args);
      }
      case "getProperty": {
        const dest = this.readDest(raw.dest, `${path}.dest`);
        const object = this.readOperand(raw.object, `${path}.object`);
        const property = this.readString(raw.property, `${path}.property`);
        if (!dest || !object || property === undefined) return undefined;
        return new PropertyGetInstruction(dest, object, property);
      }
      case "setProperty": {
        const object = this.readOperand(raw.object, `${path}.object`);
        const property = this.readString(raw.property, `${path}.property`);
        const value = this.readOperand(raw.value, `${path}.value`);
        if (!object || property === undefined || !value) return undefined;
        return new PropertySetInstruction(object, property, value);
      }
      case "arrayGet": {
        const dest = this.readDest(raw.dest, `${path}.dest`);
        const array = this.readOperand(raw.array, `${path}.array`);
        const index = this.readOperand(raw.index, `${path}.index`);
        if (!dest || !array || !index) return undefined;
        return new ArrayAccessInstruction(dest, array, index);
      }
      case "arraySet": {
        const array = this.readOperand(raw.array, `${path}.array`);
        const index = this.readOperand(raw.index, `${path}.index`);
        const value = this.readOperand(raw.value, `${path}.value`);
        if (!array || !index || !value) return undefined;
        return new ArrayAssignmentInstruction(array, index, value);
      }
      case "return": {
        if (raw.value === undefined) return new ReturnInstruction();
        const value = this.readOperand(raw.value, `${path}.value`);
        return value ? new ReturnInstruction(value) : undefined;
      }
      default:
        this.fail(
          "InvalidInstruction",
          `unknown op ${JSON.stringify(op)}`,
          `${path}.op`,
        );
        return undefined;
    }
  }

  // null signals an invalid operand; undefined an absent one
  private readOptionalDest(
    raw: unknown,
    path: string,
  ): TACOperand | undefined | null {
    if (raw === undefined) return undefined;
    return this.readDest(raw, path) ?? null;
  }

  private readDest(raw: unknown, path: string): TACOperand | undefined {
    const operand = this.readOperand(raw, path);
    if (operand?.kind === TACOperandKind.Constant) {
      this.fail("InvalidOperand", "destination cannot be a constant", path);
      return undefined;
    }
    return operand;
  }

  private readOperandList(
    raw: unknown,
    path: string,
  ): TACOperand[] | undefined {
    if (!Array.isArray(raw)) {
      this.fail("InvalidOperand", "expected an array of operands", path);
      return undefined;
    }
    const entries: unknown[] = raw;
    const operands: TACOperand[] = [];
    for (let i = 0; i < entries.length; i++) {
      const operand = this.readOperand(entries[i], `${path}[${i}]`);
      if (operand) operands.push(operand);
    }
    return operands.length === entries.length ? operands : undefined;
  }

  private readOperand(raw: unknown, path: string): TACOperand | undefined {
    if (!isRecord(raw)) {
      this.fail("InvalidOperand", "expected an operand object", path);
      return undefined;
    }
    const type = this.readType(raw.type, `${path}.type`);
    if (!type) return undefined;

    if (typeof raw.var === "string") {
      return createVariable(
        raw.var,
        type,
        raw.param === true ? { isParameter: true } : undefined,
      );
    }
    if (typeof raw.temp === "number" && Number.isInteger(raw.temp)) {
      return createTemporary(raw.temp, type);
    }
    if (isConstantValue(raw.const)) {
      return createConstant(raw.const, type);
    }
    this.fail(
      "InvalidOperand",
      'expected one of "var" (string), "temp" (integer) or "const"',
      path,
    );
    return undefined;
  }

  private readType(raw: unknown, path: string): TypeSymbol | undefined {
    if (typeof raw !== "string") {
      this.fail("UnknownType", "missing type name", path);
      return undefined;
    }
    let base = raw;
    let dimensions = 0;
    while (base.endsWith("[]")) {
      base = base.slice(0, -2);
      dimensions++;
    }

    let type: TypeSymbol;
    if (base === "object") {
      type = ObjectType;
    } else if (isPrimitiveTypeName(base)) {
      type = PrimitiveTypes[base];
    } else {
      this.fail("UnknownType", `unknown type "${raw}"`, path);
      return undefined;
    }
    return dimensions > 0 ? new ArrayTypeSymbol(type, dimensions) : type;
  }

  private readString(raw: unknown, path: string): string | undefined {
    if (typeof raw === "string") return raw;
    this.fail("InvalidInstruction", "expected a string", path);
    return undefined;
  }

  private fail(
    code: ProgramLoadError["code"],
    message: string,
    path: string,
  ): void {
    this.errors.add(new ProgramLoadError(code, message, path));
  }
}

/**
 * Parse a program from JSON text. All problems are reported together.
 */
export function parseProgram(
  text: string,
  source = "<inline>",
): TACInstruction[] {
  const errors = new ErrorCollector(source);
  let raw: unknown = undefined;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    errors.add(new ProgramLoadError("InvalidJson", message, "$"));
    errors.throwIfErrors();
  }
  const instructions = new ProgramReader(errors).readProgram(raw);
  errors.throwIfErrors();
  return instructions;
}

export function loadProgramFile(filePath: string): TACInstruction[] {
  return parseProgram(fs.readFileSync(filePath, "utf8"), filePath);
}
