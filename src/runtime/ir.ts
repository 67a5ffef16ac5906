//---------------------------------------------------------------------
// Intermediate representation of programs
//---------------------------------------------------------------------

import {RawValue} from "./values";
import {Lattice} from "./lattices";

//---------------------------------------------------------------------
// Terms
//---------------------------------------------------------------------

// We'll use Variable to represent logic variables in rule bodies and heads.
// Two occurrences of the same name inside one rule are the same variable.
export class Variable {
  constructor(public name:string) {}

  toString() {
    return "?" + this.name;
  }
}

export function isVariable(thing:unknown): thing is Variable {
  return thing instanceof Variable;
}

// `_` matches anything and binds nothing.
export class Wildcard {
  toString() {
    return "_";
  }
}

export const _ = new Wildcard();

export function isWildcard(thing:unknown): thing is Wildcard {
  return thing instanceof Wildcard;
}

export type Term = Variable|Wildcard|RawValue;

// A pattern is a term, or an array of patterns that destructures an array
// value element by element.
export type Pattern = Term|PatternList;
export interface PatternList extends Array<Pattern> {}

export function isPatternList(pattern:Pattern): pattern is PatternList {
  return Array.isArray(pattern);
}

/** Bindings of variable names to values for one partial solution. */
export type Prefix = Map<string, RawValue>;

// Computed expressions are evaluated once all of their args are bound.
export interface Computed {
  kind: "computed",
  args: Term[],
  apply: (...values:RawValue[]) => RawValue,
}

export type Expression = Term|Computed;

// Functions can never be raw values, so an object carrying an apply function
// is always a Computed.
export function isComputed(thing:unknown): thing is Computed {
  if(typeof thing !== "object" || thing === null) return false;
  return "kind" in thing && thing.kind === "computed" && "apply" in thing && typeof thing.apply === "function";
}

export function patternVariables(pattern:Pattern, output:Variable[] = []):Variable[] {
  if(isVariable(pattern)) {
    if(!output.some((v) => v.name === pattern.name)) output.push(pattern);
  } else if(isPatternList(pattern)) {
    for(let sub of pattern) patternVariables(sub, output);
  }
  return output;
}

//---------------------------------------------------------------------
// Clauses
//---------------------------------------------------------------------

/** Aggregators turn the aggregated columns of a group into zero or more results. */
export type Aggregator = (rows:Iterable<RawValue[]>) => Iterable<RawValue>;

export interface RelationClause {
  kind: "relation",
  relation: string,
  terms: Pattern[],
}

export interface LatticeClause {
  kind: "lattice",
  relation: string,
  keys: Pattern[],
  value?: Pattern,
}

export interface NotClause {
  kind: "not",
  relation: string,
  terms: Pattern[],
}

export interface AggregateClause {
  kind: "aggregate",
  name: string,
  result: Pattern,
  aggregator: Aggregator,
  values: Variable[],
  relation: string,
  terms: Pattern[],
}

export interface EachClause {
  kind: "each",
  pattern: Pattern,
  source: Expression,
}

export interface FilterClause {
  kind: "filter",
  args: Term[],
  test: (...values:RawValue[]) => boolean,
}

export interface LetClause {
  kind: "let",
  pattern: Pattern,
  value: Expression,
}

export type BodyClause = RelationClause|LatticeClause|NotClause|AggregateClause|EachClause|FilterClause|LetClause;

export interface HeadClause {
  relation: string,
  terms: Expression[],
}

export interface Rule {
  name: string,
  head: HeadClause[],
  body: BodyClause[],
}

export function clauseRelation(clause:BodyClause):string|undefined {
  switch(clause.kind) {
    case "relation":
    case "lattice":
    case "not":
    case "aggregate":
      return clause.relation;
    default:
      return;
  }
}

//---------------------------------------------------------------------
// Declarations
//---------------------------------------------------------------------

export type ColumnType = "number"|"string"|"boolean"|"any";

export interface RelationDeclaration {
  kind: "relation",
  name: string,
  columns: ColumnType[],
}

export interface LatticeDeclaration {
  kind: "lattice",
  name: string,
  columns: ColumnType[],
  lattice: Lattice,
}

export type Declaration = RelationDeclaration|LatticeDeclaration;

export interface ProgramDefinition {
  name: string,
  declarations: Declaration[],
  rules: Rule[],
}

export function printTerm(term:Pattern|Computed):string {
  if(isVariable(term) || isWildcard(term)) return term.toString();
  if(Array.isArray(term)) {
    let items:Pattern[] = term;
    return "(" + items.map(printTerm).join(", ") + ")";
  }
  if(isComputed(term)) return "<computed>";
  return JSON.stringify(term);
}
