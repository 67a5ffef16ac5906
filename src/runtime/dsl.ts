//---------------------------------------------------------------------
// Program builder
//---------------------------------------------------------------------

import {Config} from "../config";
import {RawValue, Tuple} from "./values";
import {Variable, Wildcard, _, Term, Pattern, Expression, Computed, Aggregator, BodyClause, HeadClause, Rule,
        ColumnType, Declaration, ProgramDefinition} from "./ir";
import {Lattice} from "./lattices";
import {Stratum} from "./stratifier";
import {Summary} from "./performance";
import {Evaluation, IterationListener} from "./runtime";
import {ProgramError} from "./errors";
import * as aggregates from "./aggregates";
import * as functions from "./functions";

//---------------------------------------------------------------------
// Variables
//---------------------------------------------------------------------

export type VariableMap = {[name:string]: Variable};

// `vars` hands out one Variable per property name, so a rule can just
// destructure whatever it needs: `let {x, y} = vars;`
function variables():VariableMap {
  let store = new Map<string, Variable>();
  const target:VariableMap = {};
  return new Proxy(target, {
    get(_target, prop) {
      if(typeof prop !== "string") return undefined;
      let found = store.get(prop);
      if(!found) {
        found = new Variable(prop);
        store.set(prop, found);
      }
      return found;
    },
  });
}

//---------------------------------------------------------------------
// Aggregates
//---------------------------------------------------------------------

export class AggregateBuilder {
  constructor(protected rule:RuleBuilder, public relation:string, public terms:Pattern[]) {}

  using(aggregator:Aggregator, name:string, ...values:Variable[]):Variable {
    let result = this.rule.fresh();
    this.rule.body.push({kind: "aggregate", name, result, aggregator, values, relation: this.relation, terms: this.terms});
    return result;
  }

  sum(value:Variable) {
    return this.using(aggregates.sum, "sum", value);
  }

  // Counts matching facts. Any variables given are treated as counted rather
  // than grouped on.
  count(...values:Variable[]) {
    return this.using(aggregates.count, "count", ...values);
  }

  min(value:Variable) {
    return this.using(aggregates.min, "min", value);
  }

  max(value:Variable) {
    return this.using(aggregates.max, "max", value);
  }

  mean(value:Variable) {
    return this.using(aggregates.mean, "mean", value);
  }

  percentile(p:number, value:Variable) {
    return this.using(aggregates.percentile(p), `percentile(${p})`, value);
  }
}

//---------------------------------------------------------------------
// Rules
//---------------------------------------------------------------------

export interface MathLib {
  add(a:Term, b:Term):Variable;
  subtract(a:Term, b:Term):Variable;
  multiply(a:Term, b:Term):Variable;
  divide(a:Term, b:Term):Variable;
  mod(a:Term, b:Term):Variable;
  pow(a:Term, b:Term):Variable;
  abs(a:Term):Variable;
  floor(a:Term):Variable;
  ceiling(a:Term):Variable;
  round(a:Term):Variable;
  min(...args:Term[]):Variable;
  max(...args:Term[]):Variable;
  range(start:Term, end:Term):Variable;
}

export interface CompareLib {
  lt(a:Term, b:Term):void;
  lte(a:Term, b:Term):void;
  gt(a:Term, b:Term):void;
  gte(a:Term, b:Term):void;
  eq(a:Term, b:Term):void;
  neq(a:Term, b:Term):void;
}

export interface RuleLib {
  vars:VariableMap,
  _:Wildcard,
  find:(relation:string, ...terms:Pattern[]) => void,
  not:(relation:string, ...terms:Pattern[]) => void,
  gather:(relation:string, ...terms:Pattern[]) => AggregateBuilder,
  each:(source:Expression, pattern?:Pattern) => Variable,
  bind:(pattern:Pattern, value:Expression) => void,
  compute:(apply:(...values:RawValue[]) => RawValue, ...args:Term[]) => Variable,
  filter:(test:(...values:RawValue[]) => boolean, ...args:Term[]) => void,
  math:MathLib,
  compare:CompareLib,
  record:(relation:string, ...terms:Expression[]) => HeadClause,
}

export type RuleFunction = (lib:RuleLib) => HeadClause|HeadClause[];

// Collects the body of a single rule while its build function runs. Helpers
// that produce a value (aggregates, computations, generators) bind it to a
// fresh variable and hand that back.
export class RuleBuilder {
  body:BodyClause[] = [];
  protected nextId = 0;

  constructor(public name:string, protected declarations:Map<string, Declaration>) {}

  fresh() {
    return new Variable(`$${this.nextId++}`);
  }

  protected isLattice(relation:string) {
    let declaration = this.declarations.get(relation);
    return declaration !== undefined && declaration.kind === "lattice";
  }

  // Finding a lattice uses the same shape as finding a relation: the keys
  // followed by the value.
  find = (relation:string, ...terms:Pattern[]) => {
    if(this.isLattice(relation) && terms.length) {
      let keys = terms.slice(0, -1);
      let value = terms[terms.length - 1];
      this.body.push({kind: "lattice", relation, keys, value});
      return;
    }
    this.body.push({kind: "relation", relation, terms});
  }

  not = (relation:string, ...terms:Pattern[]) => {
    this.body.push({kind: "not", relation, terms});
  }

  gather = (relation:string, ...terms:Pattern[]) => {
    return new AggregateBuilder(this, relation, terms);
  }

  each = (source:Expression, pattern?:Pattern) => {
    let item = this.fresh();
    this.body.push({kind: "each", pattern: item, source});
    if(pattern !== undefined) this.body.push({kind: "let", pattern, value: item});
    return item;
  }

  bind = (pattern:Pattern, value:Expression) => {
    this.body.push({kind: "let", pattern, value});
  }

  compute = (apply:(...values:RawValue[]) => RawValue, ...args:Term[]) => {
    let result = this.fresh();
    let value:Computed = {kind: "computed", args, apply};
    this.body.push({kind: "let", pattern: result, value});
    return result;
  }

  filter = (test:(...values:RawValue[]) => boolean, ...args:Term[]) => {
    this.body.push({kind: "filter", args, test});
  }

  // Total functions produce zero or one results, so they're generators over
  // a computed array rather than plain bindings.
  protected total(fn:functions.TotalFunction, args:Term[]) {
    let result = this.fresh();
    let source:Computed = {kind: "computed", args, apply: fn};
    this.body.push({kind: "each", pattern: result, source});
    return result;
  }

  math:MathLib = {
    add: (a, b) => this.total(functions.add, [a, b]),
    subtract: (a, b) => this.total(functions.subtract, [a, b]),
    multiply: (a, b) => this.total(functions.multiply, [a, b]),
    divide: (a, b) => this.total(functions.divide, [a, b]),
    mod: (a, b) => this.total(functions.mod, [a, b]),
    pow: (a, b) => this.total(functions.pow, [a, b]),
    abs: (a) => this.total(functions.abs, [a]),
    floor: (a) => this.total(functions.floor, [a]),
    ceiling: (a) => this.total(functions.ceiling, [a]),
    round: (a) => this.total(functions.round, [a]),
    min: (...args) => this.total(functions.min, args),
    max: (...args) => this.total(functions.max, args),
    range: (start, end) => this.total(functions.range, [start, end]),
  };

  compare:CompareLib = {
    lt: (a, b) => this.filter(functions.lt, a, b),
    lte: (a, b) => this.filter(functions.lte, a, b),
    gt: (a, b) => this.filter(functions.gt, a, b),
    gte: (a, b) => this.filter(functions.gte, a, b),
    eq: (a, b) => this.filter(functions.eq, a, b),
    neq: (a, b) => this.filter(functions.neq, a, b),
  };

  record = (relation:string, ...terms:Expression[]):HeadClause => {
    return {relation, terms};
  }

  lib():RuleLib {
    let {find, not, gather, each, bind, compute, filter, math, compare, record} = this;
    return {vars: variables(), _, find, not, gather, each, bind, compute, filter, math, compare, record};
  }

  build(func:RuleFunction):Rule {
    let result = func(this.lib());
    let head = Array.isArray(result) ? result : [result];
    return {name: this.name, head, body: this.body};
  }
}

//---------------------------------------------------------------------
// Program
//---------------------------------------------------------------------

export class Program {
  declarations:Declaration[] = [];
  rules:Rule[] = [];

  protected declared = new Map<string, Declaration>();
  protected staged:{relation:string, tuples:Tuple[]}[] = [];
  protected listeners:IterationListener[] = [];
  protected evaluation?:Evaluation;

  constructor(public name:string, public options:Config = {}) {}

  protected assertOpen(what:string) {
    if(this.evaluation) {
      throw new ProgramError(`Unable to add ${what} to '${this.name}' after it has been compiled.`);
    }
  }

  protected declare(declaration:Declaration) {
    this.assertOpen(`relation '${declaration.name}'`);
    if(this.declared.has(declaration.name)) {
      throw new ProgramError(`Relation '${declaration.name}' is declared more than once.`);
    }
    this.declared.set(declaration.name, declaration);
    this.declarations.push(declaration);
    return this;
  }

  /** Declare a relation by its column types, or just its arity. */
  relation(name:string, columns:ColumnType[]|number) {
    let types:ColumnType[] = typeof columns === "number" ? new Array<ColumnType>(columns).fill("any") : columns;
    return this.declare({kind: "relation", name, columns: types});
  }

  /** The last column holds the lattice value; the rest are the key. */
  lattice(name:string, columns:ColumnType[]|number, lattice:Lattice) {
    let types:ColumnType[] = typeof columns === "number" ? new Array<ColumnType>(columns).fill("any") : columns;
    return this.declare({kind: "lattice", name, columns: types, lattice});
  }

  rule(name:string, func:RuleFunction) {
    return this.addRule(new RuleBuilder(name, this.declared).build(func));
  }

  addRule(rule:Rule) {
    this.assertOpen(`rule '${rule.name}'`);
    this.rules.push(rule);
    return this;
  }

  insert(relation:string, tuples:Tuple[]) {
    if(this.evaluation) {
      this.evaluation.insert(relation, tuples);
    } else {
      this.staged.push({relation, tuples});
    }
    return this;
  }

  onIteration(listener:IterationListener) {
    if(this.evaluation) {
      this.evaluation.onIteration(listener);
    } else {
      this.listeners.push(listener);
    }
    return this;
  }

  definition():ProgramDefinition {
    return {name: this.name, declarations: this.declarations, rules: this.rules};
  }

  // Validates and stratifies the program. Nothing can be declared after this,
  // but facts can still be inserted; they're picked up by the next run.
  compile():Evaluation {
    if(this.evaluation) return this.evaluation;
    let evaluation = new Evaluation(this.definition(), this.options);
    for(let listener of this.listeners) evaluation.onIteration(listener);
    for(let {relation, tuples} of this.staged) evaluation.insert(relation, tuples);
    this.staged = [];
    this.evaluation = evaluation;
    return evaluation;
  }

  run():boolean {
    return this.compile().run();
  }

  runWithTimeout(timeout:number):boolean {
    return this.compile().runWithTimeout(timeout);
  }

  get strata():Stratum[] {
    return this.compile().strata;
  }

  facts(relation:string):Tuple[] {
    return this.compile().facts(relation);
  }

  value(lattice:string, ...key:RawValue[]):RawValue|undefined {
    return this.compile().value(lattice, key);
  }

  summary():Summary {
    return this.compile().summary();
  }

  report():string {
    return this.compile().report();
  }

  relationSizes():{[relation:string]: number} {
    return this.compile().relationSizes();
  }
}
