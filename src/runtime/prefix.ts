//---------------------------------------------------------------------
// Prefix functions
//---------------------------------------------------------------------

import {RawValue, Tuple, isRawArray, valuesEqual} from "./values";
import {Prefix, Pattern, Term, Expression, isVariable, isWildcard, isPatternList, isComputed, printTerm} from "./ir";
import {Bound} from "./indexes";
import {EvaluationError} from "./errors";

// A prefix is the set of variable bindings a rule body has accumulated so
// far. Clauses never modify the prefix they were handed; anything that binds
// works on a copy, so a failed match can simply throw its copy away.
export function copyPrefix(prefix:Prefix):Prefix {
  return new Map(prefix);
}

// Turn a term into a value based on the prefix, or undefined if it's still
// free (an unbound variable or a wildcard).
export function toValue(term:Term, prefix:Prefix):RawValue|undefined {
  if(isVariable(term)) return prefix.get(term.name);
  if(isWildcard(term)) return;
  return term;
}

// Like toValue, but for patterns: a destructuring pattern only has a value
// when every part of it does.
export function groundValue(pattern:Pattern, prefix:Prefix):RawValue|undefined {
  if(!isPatternList(pattern)) return toValue(pattern, prefix);
  let values:RawValue[] = [];
  for(let sub of pattern) {
    let value = groundValue(sub, prefix);
    if(value === undefined) return;
    values.push(value);
  }
  return values;
}

export function boundColumns(patterns:Pattern[], prefix:Prefix):Bound {
  let bound:Bound = [];
  for(let pattern of patterns) {
    bound.push(groundValue(pattern, prefix));
  }
  return bound;
}

// Match a value against a pattern, binding any free variables in the prefix.
// Variables that are already bound (including ones bound earlier in the same
// pattern) have to be equal.
export function unify(pattern:Pattern, value:RawValue, prefix:Prefix):boolean {
  if(isVariable(pattern)) {
    let current = prefix.get(pattern.name);
    if(current === undefined) {
      prefix.set(pattern.name, value);
      return true;
    }
    return valuesEqual(current, value);
  }
  if(isPatternList(pattern)) {
    if(!isRawArray(value) || value.length !== pattern.length) return false;
    for(let ix = 0; ix < pattern.length; ix++) {
      if(!unify(pattern[ix], value[ix], prefix)) return false;
    }
    return true;
  }
  if(isWildcard(pattern)) return true;
  return valuesEqual(pattern, value);
}

export function unifyAll(patterns:Pattern[], tuple:Tuple, prefix:Prefix):boolean {
  for(let ix = 0; ix < patterns.length; ix++) {
    if(!unify(patterns[ix], tuple[ix], prefix)) return false;
  }
  return true;
}

//---------------------------------------------------------------------
// Expressions
//---------------------------------------------------------------------

function requireValue(term:Term, prefix:Prefix, site:string):RawValue {
  let value = toValue(term, prefix);
  if(value === undefined) {
    throw new EvaluationError(site, `${printTerm(term)} is not bound`);
  }
  return value;
}

export function resolveArgs(args:Term[], prefix:Prefix, site:string):RawValue[] {
  let resolved:RawValue[] = [];
  for(let arg of args) {
    resolved.push(requireValue(arg, prefix, site));
  }
  return resolved;
}

export function evaluate(expression:Expression, prefix:Prefix, site:string):RawValue {
  if(isComputed(expression)) {
    return expression.apply(...resolveArgs(expression.args, prefix, site));
  }
  return requireValue(expression, prefix, site);
}
