export {config, init, Strategy} from "./config";
export type {Config} from "./config";
export {valueKey, valuesEqual, compareValues, compareTuples, printValue} from "./runtime/values";
export type {RawValue, Tuple} from "./runtime/values";
export {Variable, Wildcard, _} from "./runtime/ir";
export type {Term, Pattern, Prefix, Expression, Computed, Aggregator, BodyClause, HeadClause, Rule,
             ColumnType, Declaration, RelationDeclaration, LatticeDeclaration, ProgramDefinition} from "./runtime/ir";
export {Min, Max, Or, And, SetUnion, dual, product, mergeValue, latticeLeq} from "./runtime/lattices";
export type {Lattice} from "./runtime/lattices";
export {Database, RelationIndex, LatticeIndex} from "./runtime/indexes";
export type {FactIndex, View} from "./runtime/indexes";
export {DependencyGraph, buildDependencyGraph, validateProgram} from "./runtime/analyzer";
export type {DependencyEdge, Polarity} from "./runtime/analyzer";
export {stratify} from "./runtime/stratifier";
export type {Stratum} from "./runtime/stratifier";
export {Evaluation} from "./runtime/runtime";
export type {IterationInfo, IterationListener} from "./runtime/runtime";
export {PerformanceTracker, NoopPerformanceTracker} from "./runtime/performance";
export type {Summary, StratumTiming, RuleTiming} from "./runtime/performance";
export {EngineError, StratificationError, ProgramError, EvaluationError} from "./runtime/errors";
export {Program, AggregateBuilder} from "./runtime/dsl";
export type {RuleLib, RuleFunction} from "./runtime/dsl";
export * as aggregates from "./runtime/aggregates";
export {programs} from "./programs";
