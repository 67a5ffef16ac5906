//------------------------------------------------------------------------
// Values
//------------------------------------------------------------------------

/** The union of value types a fact can carry. */
export type RawValue = string|number|boolean|null|RawValue[]|{[key:string]: RawValue};

/** A fact's columns, in declaration order. */
export type Tuple = RawValue[];

export function isNumber(thing:unknown): thing is number {
  return typeof thing === "number";
}

export function isRawArray(thing:RawValue): thing is RawValue[] {
  return Array.isArray(thing);
}

//------------------------------------------------------------------------
// Keys
//------------------------------------------------------------------------

// Facts are compared structurally, but JS only gives us identity for arrays
// and objects. Every value gets a canonical string key instead: strings are
// quoted so that 1 and "1" never collide, and object keys are sorted so that
// {a, b} and {b, a} are the same value. The key is what the indexes hash on.

export function valueKey(value:RawValue):string {
  if(value === null) return "null";
  if(typeof value === "string") return JSON.stringify(value);
  if(typeof value === "number" || typeof value === "boolean") return "" + value;
  if(isRawArray(value)) {
    let parts:string[] = [];
    for(let item of value) {
      parts.push(valueKey(item));
    }
    return "[" + parts.join(",") + "]";
  }
  let parts:string[] = [];
  for(let key of Object.keys(value).sort()) {
    parts.push(JSON.stringify(key) + ":" + valueKey(value[key]));
  }
  return "{" + parts.join(",") + "}";
}

export function tupleKey(tuple:Tuple):string {
  return valueKey(tuple);
}

// Agrees with valueKey: NaN equals NaN, and 0 equals -0.
export function valuesEqual(a:RawValue, b:RawValue):boolean {
  if(a === b) return true;
  if(isNumber(a) && isNumber(b)) return isNaN(a) && isNaN(b);
  if(typeof a !== "object" || typeof b !== "object") return false;
  return valueKey(a) === valueKey(b);
}

// A total order over values, used wherever output needs to be deterministic
// (sorted sets, printed relations). Numbers sort numerically with NaN after
// all of them, everything else falls back to its key.
export function compareValues(a:RawValue, b:RawValue):number {
  if(isNumber(a) && isNumber(b)) {
    if(isNaN(a) || isNaN(b)) return (isNaN(a) ? 1 : 0) - (isNaN(b) ? 1 : 0);
    return a < b ? -1 : (a > b ? 1 : 0);
  }
  if(typeof a === "string" && typeof b === "string") return a < b ? -1 : (a > b ? 1 : 0);
  let aKey = valueKey(a);
  let bKey = valueKey(b);
  return aKey < bKey ? -1 : (aKey > bKey ? 1 : 0);
}

export function compareTuples(a:Tuple, b:Tuple):number {
  let len = Math.min(a.length, b.length);
  for(let ix = 0; ix < len; ix++) {
    let diff = compareValues(a[ix], b[ix]);
    if(diff !== 0) return diff;
  }
  return a.length - b.length;
}

export function printValue(value:RawValue):string {
  if(typeof value === "string") return value;
  return valueKey(value);
}

//------------------------------------------------------------------------
// Iterator
//------------------------------------------------------------------------

// The clause evaluator produces and throws away a lot of intermediate
// binding lists. Rather than allocating a fresh array for every clause, we
// keep two Iterators per evaluation and swap them, never shrinking the
// backing array. You iterate with next():
//
// let current;
// while((current = iterator.next()) !== undefined) {
//   ...
// }

export class Iterator<T> {
  array:T[] = [];
  length:number = 0;
  ix:number = 0;

  push(value:T) {
    this.array[this.length++] = value;
  }

  clear() {
    this.length = 0;
    this.reset();
  }

  reset() {
    this.ix = 0;
  }

  next():T|undefined {
    if(this.ix < this.length) return this.array[this.ix++];
    return;
  }
}
