import type { TACOperand } from "../../ir/tac_operand.js";
import { TACOperandKind } from "../../ir/tac_operand.js";

/**
 * Identity of an operand in the alias tracker, or null for operands that
 * never denote shared storage (constants and primitive-typed values).
 */
export const aliasKey = (operand: TACOperand | undefined): string | null => {
  if (!operand || !operand.type.isReference) return null;
  if (operand.kind === TACOperandKind.Variable) {
    return `v:${operand.name}`;
  }
  if (operand.kind === TACOperandKind.Temporary) {
    return `t:${operand.id}`;
  }
  return null;
};
