/**
 * Instructions of the three-address code the alias driver consumes. Only
 * the kinds that move, store or hand out references are modeled.
 */

import type { TACOperand } from "./tac_operand.js";
import { operandToString } from "./tac_operand.js";

export enum TACInstructionKind {
  Assignment = "Assignment",
  BinaryOp = "BinaryOp",
  Copy = "Copy",
  Cast = "Cast",
  Call = "Call",
  MethodCall = "MethodCall",
  PropertyGet = "PropertyGet",
  PropertySet = "PropertySet",
  Return = "Return",
  ArrayAccess = "ArrayAccess",
  ArrayAssignment = "ArrayAssignment",
}

const defines = (dest: TACOperand | undefined, rhs: string): string =>
  dest ? `${operandToString(dest)} = ${rhs}` : rhs;

const invocation = (callee: string, args: readonly TACOperand[]): string =>
  `call ${callee}(${args.map(operandToString).join(", ")})`;

const element = (array: TACOperand, index: TACOperand): string =>
  `${operandToString(array)}[${operandToString(index)}]`;

/** `dest = src`, as written by the source program. */
export class AssignmentInstruction {
  readonly kind = TACInstructionKind.Assignment;

  constructor(
    readonly dest: TACOperand,
    readonly src: TACOperand,
  ) {}

  toString(): string {
    return defines(this.dest, operandToString(this.src));
  }
}

/**
 * `dest = left <operator> right`. The result is a new value: it never
 * points at either operand.
 */
export class BinaryOpInstruction {
  readonly kind = TACInstructionKind.BinaryOp;

  constructor(
    readonly dest: TACOperand,
    readonly left: TACOperand,
    readonly operator: string,
    readonly right: TACOperand,
  ) {}

  toString(): string {
    const { left, operator, right } = this;
    return defines(
      this.dest,
      [operandToString(left), operator, operandToString(right)].join(" "),
    );
  }
}

/** Compiler-introduced `dest = src`. */
export class CopyInstruction {
  readonly kind = TACInstructionKind.Copy;

  constructor(
    readonly dest: TACOperand,
    readonly src: TACOperand,
  ) {}

  toString(): string {
    return defines(this.dest, operandToString(this.src));
  }
}

// Casts keep the reference; only the static type changes.
export class CastInstruction {
  readonly kind = TACInstructionKind.Cast;

  constructor(
    readonly dest: TACOperand,
    readonly src: TACOperand,
  ) {}

  toString(): string {
    return defines(this.dest, `cast ${operandToString(this.src)}`);
  }
}

/** Free function call. `dest` is absent when the result is discarded. */
export class CallInstruction {
  readonly kind = TACInstructionKind.Call;

  constructor(
    readonly dest: TACOperand | undefined,
    readonly func: string,
    readonly args: TACOperand[],
  ) {}

  toString(): string {
    return defines(this.dest, invocation(this.func, this.args));
  }
}

/**
 * Call of `method` on `object`. The receiver escapes to the callee just
 * like the arguments do.
 */
export class MethodCallInstruction {
  readonly kind = TACInstructionKind.MethodCall;

  constructor(
    readonly dest: TACOperand | undefined,
    readonly object: TACOperand,
    readonly method: string,
    readonly args: TACOperand[],
  ) {}

  toString(): string {
    const callee = `${operandToString(this.object)}.${this.method}`;
    return defines(this.dest, invocation(callee, this.args));
  }
}

export class PropertyGetInstruction {
  readonly kind = TACInstructionKind.PropertyGet;

  constructor(
    readonly dest: TACOperand,
    readonly object: TACOperand,
    readonly property: string,
  ) {}

  toString(): string {
    return defines(
      this.dest,
      `${operandToString(this.object)}.${this.property}`,
    );
  }
}

/** Store into a field: writes `object`. */
export class PropertySetInstruction {
  readonly kind = TACInstructionKind.PropertySet;

  constructor(
    readonly object: TACOperand,
    readonly property: string,
    readonly value: TACOperand,
  ) {}

  toString(): string {
    const target = `${operandToString(this.object)}.${this.property}`;
    return `${target} = ${operandToString(this.value)}`;
  }
}

export class ReturnInstruction {
  readonly kind = TACInstructionKind.Return;

  constructor(readonly value?: TACOperand) {}

  toString(): string {
    return this.value ? `return ${operandToString(this.value)}` : "return";
  }
}

/** Element load. The whole array is one container, whatever the index. */
export class ArrayAccessInstruction {
  readonly kind = TACInstructionKind.ArrayAccess;

  constructor(
    readonly dest: TACOperand,
    readonly array: TACOperand,
    readonly index: TACOperand,
  ) {}

  toString(): string {
    return defines(this.dest, element(this.array, this.index));
  }
}

/** Element store: writes `array`. */
export class ArrayAssignmentInstruction {
  readonly kind = TACInstructionKind.ArrayAssignment;

  constructor(
    readonly array: TACOperand,
    readonly index: TACOperand,
    readonly value: TACOperand,
  ) {}

  toString(): string {
    return `${element(this.array, this.index)} = ${operandToString(this.value)}`;
  }
}

export type TACInstruction =
  | AssignmentInstruction
  | BinaryOpInstruction
  | CopyInstruction
  | CastInstruction
  | CallInstruction
  | MethodCallInstruction
  | PropertyGetInstruction
  | PropertySetInstruction
  | ReturnInstruction
  | ArrayAccessInstruction
  | ArrayAssignmentInstruction;
