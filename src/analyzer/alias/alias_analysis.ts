import {
  type TACInstruction,
  TACInstructionKind,
} from "../ir/tac_instruction.js";
import type { TACOperand } from "../ir/tac_operand.js";
import { operandToString, TACOperandKind } from "../ir/tac_operand.js";
import { AliasTracker } from "./alias_tracker.js";
import { aliasKey } from "./utils/operands.js";

/**
 * Alias analysis options
 */
export interface AliasAnalysisOptions {
  verbose?: boolean;
  // Calls to these functions or methods do not let their arguments escape.
  pureFunctions?: Iterable<string>;
  // Treat parameters as values of unknown provenance (default: true).
  parametersAreWildcards?: boolean;
}

/**
 * Alias answers for one TAC instruction list, phrased in operands.
 * Constants and primitive-typed operands never alias anything.
 */
export class AliasAnalysis {
  constructor(
    readonly tracker: AliasTracker<string, TACInstruction>,
    private readonly operands: ReadonlyMap<string, TACOperand>,
  ) {}

  contains(operand: TACOperand): boolean {
    const key = aliasKey(operand);
    return key !== null && this.tracker.contains(key);
  }

  isWildcard(operand: TACOperand): boolean {
    const key = aliasKey(operand);
    return key !== null && this.tracker.isWildcard(key);
  }

  mayAlias(a: TACOperand, b: TACOperand): boolean {
    const keyA = aliasKey(a);
    const keyB = aliasKey(b);
    if (keyA === null || keyB === null) return false;
    return this.tracker.mayAlias(keyA, keyB);
  }

  mayAliasGroups(a: Iterable<TACOperand>, b: Iterable<TACOperand>): boolean {
    return this.tracker.mayAliasGroups(this.keysOf(a), this.keysOf(b));
  }

  hasWriters(operand: TACOperand): boolean {
    const key = aliasKey(operand);
    return key !== null && this.tracker.hasWriters(key);
  }

  writesTo(instruction: TACInstruction, operand: TACOperand): boolean {
    const key = aliasKey(operand);
    return key !== null && this.tracker.writesTo(instruction, key);
  }

  getAliases(operand: TACOperand): TACOperand[] {
    const key = aliasKey(operand);
    if (key === null) return [];
    const aliases: TACOperand[] = [];
    for (const alias of this.tracker.getAliases(key)) {
      const resolved = this.operands.get(alias);
      if (resolved) aliases.push(resolved);
    }
    return aliases;
  }

  getWildcardWriters(): ReadonlySet<TACInstruction> {
    return this.tracker.getWildcardWriters();
  }

  /**
   * Look up a tracked operand by its display name ("a", "t3").
   */
  findOperand(name: string): TACOperand | undefined {
    for (const operand of this.operands.values()) {
      if (operandToString(operand) === name) return operand;
    }
    return undefined;
  }

  dump(): string {
    return this.tracker.dump();
  }

  private keysOf(operands: Iterable<TACOperand>): string[] {
    const keys: string[] = [];
    for (const operand of operands) {
      const key = aliasKey(operand);
      if (key !== null) keys.push(key);
    }
    return keys;
  }
}

class AliasGraphBuilder {
  readonly operands = new Map<string, TACOperand>();
  readonly tracker: AliasTracker<string, TACInstruction>;
  private readonly pureFunctions: Set<string>;

  constructor(private readonly options: AliasAnalysisOptions) {
    this.pureFunctions = new Set(options.pureFunctions ?? []);
    this.tracker = new AliasTracker<string, TACInstruction>({
      formatValue: (key) => {
        const operand = this.operands.get(key);
        return operand ? operandToString(operand) : key;
      },
      formatInstruction: (inst) => inst.toString(),
    });
  }

  visit(inst: TACInstruction): void {
    switch (inst.kind) {
      case TACInstructionKind.Assignment:
      case TACInstructionKind.Copy:
      case TACInstructionKind.Cast: {
        const dest = this.track(inst.dest);
        const src = this.track(inst.src);
        if (dest !== null && src !== null) {
          this.link(dest, src);
        }
        return;
      }
      case TACInstructionKind.BinaryOp:
        this.track(inst.left);
        this.track(inst.right);
        this.track(inst.dest);
        return;
      case TACInstructionKind.PropertyGet:
      case TACInstructionKind.ArrayAccess: {
        const container =
          inst.kind === TACInstructionKind.PropertyGet
            ? inst.object
            : inst.array;
        const dest = this.track(inst.dest);
        const source = this.track(container);
        // Contents alias their container.
        if (dest !== null && source !== null) {
          this.link(dest, source);
        }
        return;
      }
      case TACInstructionKind.PropertySet:
      case TACInstructionKind.ArrayAssignment: {
        const container =
          inst.kind === TACInstructionKind.PropertySet
            ? inst.object
            : inst.array;
        const target = this.track(container);
        const value = this.track(inst.value);
        if (target === null) return;
        if (value !== null) {
          if (this.tracker.isWildcard(value)) {
            this.markWildcard(target, inst);
          } else if (this.tracker.isWildcard(target)) {
            this.markWildcard(value, inst);
          } else {
            this.tracker.makePointerTo(value, target);
          }
        }
        this.tracker.registerWrite(target, inst);
        return;
      }
      case TACInstructionKind.Call:
        this.visitCall(inst, inst.func, inst.args, inst.dest);
        return;
      case TACInstructionKind.MethodCall:
        this.visitCall(
          inst,
          inst.method,
          [inst.object, ...inst.args],
          inst.dest,
        );
        return;
      case TACInstructionKind.Return:
        if (inst.value) this.track(inst.value);
        return;
    }
  }

  private visitCall(
    inst: TACInstruction,
    callee: string,
    inputs: TACOperand[],
    output: TACOperand | undefined,
  ): void {
    const keys: string[] = [];
    for (const input of inputs) {
      const key = this.track(input);
      if (key !== null) keys.push(key);
    }
    const dest = output ? this.track(output) : null;

    if (this.pureFunctions.has(callee)) {
      // The result may be any of the reference arguments.
      if (dest !== null) {
        for (const key of keys) this.link(dest, key);
      }
      return;
    }

    if (this.options.verbose) {
      console.warn(`[alias] opaque call: ${inst.toString()}`);
    }
    for (const key of keys) {
      this.markWildcard(key, inst);
      this.tracker.registerWrite(key, inst);
    }
    if (dest !== null) {
      this.markWildcard(dest, inst);
    }
  }

  /**
   * Register a reference operand on first sight. Returns its tracker key,
   * or null when the operand never aliases.
   */
  private track(operand: TACOperand): string | null {
    const key = aliasKey(operand);
    if (key === null) return null;
    if (!this.operands.has(key)) {
      this.operands.set(key, operand);
    }
    if (this.tracker.contains(key)) return key;

    this.tracker.makeFreshValue(key);
    if (
      operand.kind === TACOperandKind.Variable &&
      operand.isParameter &&
      this.options.parametersAreWildcards !== false
    ) {
      this.markWildcard(key);
    }
    return key;
  }

  private link(from: string, to: string): void {
    if (this.tracker.isWildcard(to)) {
      this.markWildcard(from);
      return;
    }
    this.tracker.makePointerTo(from, to);
  }

  private markWildcard(key: string, cause?: TACInstruction): void {
    if (this.tracker.isWildcard(key)) return;
    this.tracker.setWildcard(key);
    if (this.options.verbose) {
      const operand = this.operands.get(key);
      const name = operand ? operandToString(operand) : key;
      const reason = cause ? ` at ${cause.toString()}` : "";
      console.warn(`[alias] ${name} has unknown provenance${reason}`);
    }
  }
}

/**
 * Build the points-to graph for an instruction list, visiting instructions
 * in program order.
 */
export const analyzeAliases = (
  instructions: readonly TACInstruction[],
  options: AliasAnalysisOptions = {},
): AliasAnalysis => {
  const builder = new AliasGraphBuilder(options);
  for (const inst of instructions) {
    builder.visit(inst);
  }
  return new AliasAnalysis(builder.tracker, builder.operands);
};
