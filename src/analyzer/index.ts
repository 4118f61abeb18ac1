/**
 * Alias analysis over TAC: points-to graph, tracker, driver and loader
 */

export {
  AliasAnalysis,
  type AliasAnalysisOptions,
  analyzeAliases,
} from "./alias/alias_analysis.js";
export {
  AliasTracker,
  type AliasTrackerOptions,
} from "./alias/alias_tracker.js";
export {
  BfsDirection,
  type Element,
  type ElementId,
  PointsToGraph,
} from "./alias/points_to_graph.js";
export {
  AggregateProgramLoadError,
  AliasTrackerError,
  type AliasTrackerErrorCode,
  ProgramLoadError,
  type ProgramLoadErrorCode,
} from "./errors/alias_errors.js";
export { loadProgramFile, parseProgram } from "./ir/program_loader.js";
export * from "./ir/tac_instruction.js";
export * from "./ir/tac_operand.js";
export * from "./ir/type_symbols.js";
