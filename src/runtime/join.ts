//---------------------------------------------------------------------
// Clause evaluation
//---------------------------------------------------------------------

import {Tuple, Iterator, isRawArray, valueKey} from "./values";
import {Prefix, Pattern, Rule, BodyClause, LatticeClause, _} from "./ir";
import {Database, View} from "./indexes";
import {negate, aggregate} from "./aggregates";
import {boundColumns, copyPrefix, unify, unifyAll, resolveArgs, evaluate} from "./prefix";
import {EvaluationError} from "./errors";

export type Emit = (relation:string, tuple:Tuple) => void;

// A lattice clause is matched like a relation clause whose last column is the
// lattice value. Leaving the value out means we don't care what it is.
function latticeTerms(clause:LatticeClause):Pattern[] {
  return clause.keys.concat([clause.value === undefined ? _ : clause.value]);
}

//---------------------------------------------------------------------
// RuleEvaluator
//---------------------------------------------------------------------

// Runs one rule body as a pipeline. We start with a single empty prefix and
// hand every clause the prefixes that survived the previous one; each clause
// either drops a prefix, passes it through, or extends copies of it with new
// bindings. Whatever makes it out the end instantiates the heads.
//
// The evaluator keeps two result Iterators and flips between them, so running
// the same rule again every iteration doesn't allocate new result arrays.
export class RuleEvaluator {
  results = new Iterator<Prefix>();
  nextResults = new Iterator<Prefix>();
  // Pre-expanded lattice patterns, so we don't rebuild them per prefix.
  protected terms:(Pattern[]|undefined)[];

  constructor(public rule:Rule, public database:Database) {
    this.terms = rule.body.map((clause) => {
      if(clause.kind === "relation") return clause.terms;
      if(clause.kind === "lattice") return latticeTerms(clause);
      return;
    });
  }

  get site() {
    return `rule '${this.rule.name}'`;
  }

  // `views` gives, for every body position, which part of the relation it
  // reads. Positions that don't read a relation ignore it.
  exec(views:View[], emit:Emit):number {
    try {
      return this.run(views, emit);
    } catch(error) {
      throw EvaluationError.wrap(this.site, error);
    }
  }

  protected run(views:View[], emit:Emit):number {
    let {results, nextResults} = this;
    results.clear();
    results.push(new Map());

    let body = this.rule.body;
    for(let ix = 0; ix < body.length; ix++) {
      nextResults.clear();
      let clause = body[ix];
      let prefix:Prefix|undefined;
      while((prefix = results.next()) !== undefined) {
        this.clause(ix, clause, views[ix] || "full", prefix, nextResults);
      }
      let tmp = results;
      results = nextResults;
      nextResults = tmp;
      if(!results.length) break;
    }
    // Leave both buffers where the next exec will find them.
    this.results = results;
    this.nextResults = nextResults;

    let count = 0;
    results.reset();
    let prefix:Prefix|undefined;
    while((prefix = results.next()) !== undefined) {
      for(let head of this.rule.head) {
        let tuple:Tuple = [];
        for(let term of head.terms) {
          tuple.push(evaluate(term, prefix, this.site));
        }
        emit(head.relation, tuple);
        count++;
      }
    }
    return count;
  }

  protected match(terms:Pattern[], relation:string, view:View, prefix:Prefix, output:Iterator<Prefix>) {
    let index = this.database.get(relation);
    let bound = boundColumns(terms, prefix);
    for(let tuple of index.lookup(bound, view)) {
      let next = copyPrefix(prefix);
      if(unifyAll(terms, tuple, next)) output.push(next);
    }
  }

  protected clause(ix:number, clause:BodyClause, view:View, prefix:Prefix, output:Iterator<Prefix>) {
    switch(clause.kind) {
      case "relation":
      case "lattice": {
        let terms = this.terms[ix];
        if(terms) this.match(terms, clause.relation, view, prefix, output);
        return;
      }
      case "not": {
        if(negate(this.database.get(clause.relation), clause, prefix)) output.push(prefix);
        return;
      }
      case "aggregate": {
        aggregate(this.database.get(clause.relation), clause, prefix, (next) => output.push(next));
        return;
      }
      case "each": {
        let source = evaluate(clause.source, prefix, this.site);
        if(!isRawArray(source)) {
          throw new EvaluationError(this.site, `each expects an array, got ${valueKey(source)}`);
        }
        for(let item of source) {
          let next = copyPrefix(prefix);
          if(unify(clause.pattern, item, next)) output.push(next);
        }
        return;
      }
      case "filter": {
        if(clause.test(...resolveArgs(clause.args, prefix, this.site))) output.push(prefix);
        return;
      }
      case "let": {
        let value = evaluate(clause.value, prefix, this.site);
        let next = copyPrefix(prefix);
        if(unify(clause.pattern, value, next)) output.push(next);
        return;
      }
    }
  }
}

// Which body positions read a relation that is still being derived, i.e.
// one of the given stratum members.
export function recursivePositions(rule:Rule, members:Set<string>):number[] {
  let positions:number[] = [];
  rule.body.forEach((clause, ix) => {
    if((clause.kind === "relation" || clause.kind === "lattice") && members.has(clause.relation)) {
      positions.push(ix);
    }
  });
  return positions;
}

// The semi-naive plan for reading the delta at `position`: recursive
// positions before it read the stable part, everything after it reads the
// full relation. Together the plans for every position cover each new
// combination of facts exactly once.
export function deltaViews(rule:Rule, positions:number[], position:number):View[] {
  let views:View[] = rule.body.map(():View => "full");
  for(let ix of positions) {
    if(ix < position) views[ix] = "stable";
  }
  views[position] = "delta";
  return views;
}
