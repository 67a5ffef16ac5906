//---------------------------------------------------------------------
// Runtime
//---------------------------------------------------------------------

import {Config, Strategy, resolve} from "../config";
import {RawValue, Tuple, compareTuples} from "./values";
import {ProgramDefinition, Rule} from "./ir";
import {Database, View} from "./indexes";
import {validateProgram, buildDependencyGraph} from "./analyzer";
import {Stratum, stratify} from "./stratifier";
import {RuleEvaluator, recursivePositions, deltaViews} from "./join";
import {PerformanceTracker, NoopPerformanceTracker, Summary, now, elapsed} from "./performance";

//---------------------------------------------------------------------
// Plans
//---------------------------------------------------------------------

// For every rule we work out up front which body positions are recursive and
// what the semi-naive variant for each of them looks like, so that the
// iteration loop only has to pick the variants whose delta is non-empty.

type DeltaPlan = {relation:string, views:View[]};

type RulePlan = {
  evaluator:RuleEvaluator,
  full:View[],
  deltas:DeltaPlan[],
};

type StratumPlan = {
  stratum:Stratum,
  rules:RulePlan[],
};

function planRule(rule:Rule, database:Database, members:Set<string>):RulePlan {
  let positions = recursivePositions(rule, members);
  let deltas:DeltaPlan[] = [];
  for(let position of positions) {
    let clause = rule.body[position];
    if(clause.kind !== "relation" && clause.kind !== "lattice") continue;
    deltas.push({relation: clause.relation, views: deltaViews(rule, positions, position)});
  }
  let full = rule.body.map(():View => "full");
  return {evaluator: new RuleEvaluator(rule, database), full, deltas};
}

//---------------------------------------------------------------------
// Evaluation
//---------------------------------------------------------------------

export interface IterationInfo {
  stratum:number,
  iteration:number,
  changed:boolean,
}

export type IterationListener = (info:IterationInfo) => void;

export class Evaluation {
  settings:Required<Config>;
  database:Database;
  strata:Stratum[];
  perf:PerformanceTracker;
  // Whether the last run made it all the way to the fixpoint.
  complete = false;

  protected plans:StratumPlan[];
  protected listeners:IterationListener[] = [];

  constructor(public program:ProgramDefinition, opts:Config = {}) {
    this.settings = resolve(opts);
    validateProgram(program);
    this.strata = stratify(program, buildDependencyGraph(program));
    this.database = new Database(program.declarations);
    this.perf = this.settings.timing ? new PerformanceTracker() : new NoopPerformanceTracker();
    this.plans = this.strata.map((stratum) => {
      let members = new Set(stratum.relations);
      let rules = stratum.rules.map((rule) => planRule(rule, this.database, members));
      return {stratum, rules};
    });
  }

  protected debug(...args:unknown[]) {
    if(this.settings.debug) console.log(...args);
  }

  onIteration(listener:IterationListener) {
    this.listeners.push(listener);
    return this;
  }

  insert(relation:string, tuples:Tuple[]) {
    for(let tuple of tuples) {
      this.database.inject(relation, tuple);
    }
    return this;
  }

  //---------------------------------------------------------------------
  // Running
  //---------------------------------------------------------------------

  run():boolean {
    return this.runWithTimeout(Infinity);
  }

  // The deadline is only looked at between iterations. An iteration that has
  // started always commits, so stopping early leaves every relation holding
  // a subset of what a full run would derive, never something half-applied.
  runWithTimeout(timeout:number):boolean {
    let start = now();
    let expired = () => timeout !== Infinity && elapsed(start) >= timeout;
    this.complete = false;
    for(let plan of this.plans) {
      if(!this.runStratum(plan, expired)) {
        this.debug(`Timed out in stratum ${plan.stratum.index} after ${elapsed(start).toFixed(3)}ms`);
        return false;
      }
    }
    this.complete = true;
    return true;
  }

  protected runStratum(plan:StratumPlan, expired:() => boolean):boolean {
    let {stratum} = plan;
    let {database, perf} = this;
    let naive = this.settings.strategy === Strategy.naive;
    this.debug(`Stratum ${stratum.index}: ${stratum.relations.join(", ")}`);
    perf.stratum(stratum.index, stratum.relations);
    try {
      // Anything inserted from the outside becomes visible now.
      for(let relation of stratum.relations) {
        database.get(relation).commit();
      }

      let changed = new Set<string>();
      let iteration = 0;
      while(true) {
        if(expired()) return false;
        perf.iteration();

        for(let rule of plan.rules) {
          if(iteration === 0 || naive) {
            this.exec(rule.evaluator, rule.full);
            continue;
          }
          for(let delta of rule.deltas) {
            if(changed.has(delta.relation)) this.exec(rule.evaluator, delta.views);
          }
        }

        changed = new Set<string>();
        for(let relation of stratum.relations) {
          if(database.get(relation).commit()) changed.add(relation);
        }
        let any = changed.size > 0;
        this.debug(`  iteration ${iteration}: ${any ? Array.from(changed).join(", ") : "no changes"}`);
        for(let listener of this.listeners) {
          listener({stratum: stratum.index, iteration, changed: any});
        }
        iteration++;

        // Without recursion the stratum's inputs are already settled, so a
        // second pass can't find anything the first one didn't.
        if(!any || !stratum.recursive) return true;
      }
    } finally {
      perf.stratumEnd();
    }
  }

  protected exec(evaluator:RuleEvaluator, views:View[]) {
    let {database, perf} = this;
    let name = evaluator.rule.name;
    perf.rule(name);
    try {
      evaluator.exec(views, (relation, tuple) => database.get(relation).insert(tuple));
    } finally {
      perf.ruleEnd(name);
    }
  }

  //---------------------------------------------------------------------
  // Results
  //---------------------------------------------------------------------

  /** Every committed fact of a relation or lattice, sorted. */
  facts(relation:string):Tuple[] {
    return this.database.get(relation).tuples().sort(compareTuples);
  }

  value(lattice:string, key:Tuple):RawValue|undefined {
    return this.database.lattice(lattice).get(key);
  }

  summary():Summary {
    return this.perf.summary();
  }

  report():string {
    return this.perf.report();
  }

  relationSizes():{[relation:string]: number} {
    return this.database.sizes();
  }
}
