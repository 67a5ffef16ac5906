//------------------------------------------------------------------------
// Negation and aggregation
//------------------------------------------------------------------------

import {RawValue, Tuple, isNumber, valueKey, compareValues} from "./values";
import {Prefix, Aggregator, AggregateClause, NotClause, Variable, patternVariables, isWildcard} from "./ir";
import {FactIndex} from "./indexes";
import {boundColumns, copyPrefix, unify, unifyAll} from "./prefix";

// Both of these only ever read relations from strictly earlier strata, which
// the stratifier guarantees are completely settled by the time we get here.
// That's why they always look at the full view.

//------------------------------------------------------------------------
// Negation
//------------------------------------------------------------------------

// A negation succeeds when nothing in the relation matches. Bound variables
// and constants have to match exactly; unbound variables and wildcards match
// anything, although an unbound variable repeated within the clause still
// has to match itself.
export function negate(index:FactIndex, clause:NotClause, prefix:Prefix):boolean {
  let bound = boundColumns(clause.terms, prefix);
  let ground:Tuple = [];
  for(let value of bound) {
    if(value === undefined) break;
    ground.push(value);
  }
  // Fully bound, it's a single fact; with only wildcards left free, any
  // match will do. Anything else has to be unified, since a free variable can
  // repeat and a destructuring pattern has a shape to match.
  if(ground.length === bound.length) return !index.has(ground);
  let wildcards = clause.terms.every((term, ix) => bound[ix] !== undefined || isWildcard(term));
  if(wildcards) return !index.check(bound, "full");
  for(let tuple of index.lookup(bound, "full")) {
    if(unifyAll(clause.terms, tuple, copyPrefix(prefix))) return false;
  }
  return true;
}

//------------------------------------------------------------------------
// Aggregation
//------------------------------------------------------------------------

type Group = {prefix:Prefix, rows:RawValue[][]};

// The variables of the aggregated clause fall into three camps:
//
//   - the aggregated values, which are local to the aggregate
//   - variables already bound by earlier clauses, which filter the relation
//   - everything else, which the aggregate groups by and binds for the
//     clauses that follow
//
// When nothing is left to group by there is exactly one group, even if no
// fact matched, so `count` can say 0.
export function groupingVariables(clause:AggregateClause, prefix:Prefix):Variable[] {
  let locals = new Set<string>();
  for(let value of clause.values) locals.add(value.name);
  let grouping:Variable[] = [];
  for(let term of clause.terms) {
    for(let variable of patternVariables(term)) {
      if(locals.has(variable.name) || prefix.has(variable.name)) continue;
      if(grouping.some((v) => v.name === variable.name)) continue;
      grouping.push(variable);
    }
  }
  return grouping;
}

export function aggregate(index:FactIndex, clause:AggregateClause, prefix:Prefix, emit:(prefix:Prefix) => void) {
  let grouping = groupingVariables(clause, prefix);
  let groups = new Map<string, Group>();
  if(!grouping.length) groups.set("[]", {prefix, rows: []});

  let bound = boundColumns(clause.terms, prefix);
  for(let tuple of index.lookup(bound, "full")) {
    let scratch = copyPrefix(prefix);
    if(!unifyAll(clause.terms, tuple, scratch)) continue;
    let key:RawValue[] = [];
    for(let variable of grouping) {
      let value = scratch.get(variable.name);
      if(value !== undefined) key.push(value);
    }
    let groupKey = valueKey(key);
    let group = groups.get(groupKey);
    if(!group) {
      let groupPrefix = copyPrefix(prefix);
      for(let variable of grouping) {
        let value = scratch.get(variable.name);
        if(value !== undefined) groupPrefix.set(variable.name, value);
      }
      group = {prefix: groupPrefix, rows: []};
      groups.set(groupKey, group);
    }
    let row:RawValue[] = [];
    for(let variable of clause.values) {
      let value = scratch.get(variable.name);
      if(value !== undefined) row.push(value);
    }
    group.rows.push(row);
  }

  for(let group of groups.values()) {
    for(let result of clause.aggregator(group.rows)) {
      let next = copyPrefix(group.prefix);
      if(unify(clause.result, result, next)) emit(next);
    }
  }
}

//------------------------------------------------------------------------
// Built-in aggregators
//------------------------------------------------------------------------

function numbers(name:string, rows:Iterable<RawValue[]>):number[] {
  let values:number[] = [];
  for(let row of rows) {
    let value = row[0];
    if(!isNumber(value)) throw new TypeError(`${name} expects numbers, got ${value === undefined ? "nothing" : valueKey(value)}`);
    values.push(value);
  }
  return values;
}

export const sum:Aggregator = (rows) => {
  let total = 0;
  for(let value of numbers("sum", rows)) total += value;
  return [total];
};

export const count:Aggregator = (rows) => {
  let total = 0;
  for(let _ of rows) total++;
  return [total];
};

export const mean:Aggregator = (rows) => {
  let values = numbers("mean", rows);
  if(!values.length) return [];
  let total = 0;
  for(let value of values) total += value;
  return [total / values.length];
};

// min and max work on anything we can order, not just numbers.
function extreme(rows:Iterable<RawValue[]>, better:(diff:number) => boolean):RawValue[] {
  let found:RawValue|undefined;
  for(let row of rows) {
    let value = row[0];
    if(value === undefined) continue;
    if(found === undefined || better(compareValues(value, found))) found = value;
  }
  return found === undefined ? [] : [found];
}

export const min:Aggregator = (rows) => extreme(rows, (diff) => diff < 0);

export const max:Aggregator = (rows) => extreme(rows, (diff) => diff > 0);

/** Nearest-rank percentile, with p between 0 and 100. */
export function percentile(p:number):Aggregator {
  if(!(p >= 0 && p <= 100)) throw new RangeError(`percentile expects a value between 0 and 100, got ${p}`);
  return (rows) => {
    let values = numbers("percentile", rows).sort((a, b) => a - b);
    if(!values.length) return [];
    let ix = Math.min(Math.floor(values.length * p / 100), values.length - 1);
    return [values[ix]];
  };
}
