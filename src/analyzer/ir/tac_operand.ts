/**
 * TAC (Three-Address Code) operand types
 */

import type { TypeSymbol } from "./type_symbols.js";

/**
 * TAC operand kinds
 */
export enum TACOperandKind {
  Variable = "Variable",
  Constant = "Constant",
  Temporary = "Temporary",
}

export type ConstantValue = number | string | boolean | null;

/**
 * Variable operand
 */
export interface VariableOperand {
  kind: TACOperandKind.Variable;
  name: string;
  type: TypeSymbol;
  isParameter?: boolean;
}

/**
 * Constant operand
 */
export interface ConstantOperand {
  kind: TACOperandKind.Constant;
  value: ConstantValue;
  type: TypeSymbol;
}

/**
 * Temporary variable operand
 */
export interface TemporaryOperand {
  kind: TACOperandKind.Temporary;
  id: number;
  type: TypeSymbol;
}

export type TACOperand = VariableOperand | ConstantOperand | TemporaryOperand;

/**
 * Helper functions to create operands
 */
export function createVariable(
  name: string,
  type: TypeSymbol,
  metadata?: {
    isParameter?: boolean;
  },
): VariableOperand {
  return {
    kind: TACOperandKind.Variable,
    name,
    type,
    ...metadata,
  };
}

export function createConstant(
  value: ConstantValue,
  type: TypeSymbol,
): ConstantOperand {
  return {
    kind: TACOperandKind.Constant,
    value,
    type,
  };
}

export function createTemporary(
  id: number,
  type: TypeSymbol,
): TemporaryOperand {
  return {
    kind: TACOperandKind.Temporary,
    id,
    type,
  };
}

/**
 * Convert operand to string for display
 */
export function operandToString(operand: TACOperand): string {
  switch (operand.kind) {
    case TACOperandKind.Variable:
      return operand.name;
    case TACOperandKind.Constant:
      if (typeof operand.value === "string") {
        return `"${operand.value}"`;
      }
      return String(operand.value);
    case TACOperandKind.Temporary:
      return `t${operand.id}`;
  }
}
