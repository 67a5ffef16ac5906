//---------------------------------------------------------------------
// Lattices
//---------------------------------------------------------------------

import {RawValue, isNumber, isRawArray, valuesEqual, valueKey, compareValues} from "./values";

// A lattice column keeps a single value per key and only ever moves it
// upward with join. The engine trusts that join is associative, commutative
// and idempotent; it never checks. A join that breaks those laws will keep a
// stratum from terminating or settle on the wrong value.
export interface Lattice {
  name:string;
  join(a:RawValue, b:RawValue):RawValue;
  // Defaults to structural equality.
  equals?(a:RawValue, b:RawValue):boolean;
  // Only needed by dual().
  meet?(a:RawValue, b:RawValue):RawValue;
}

export function latticeEquals(lattice:Lattice, a:RawValue, b:RawValue):boolean {
  if(lattice.equals) return lattice.equals(a, b);
  return valuesEqual(a, b);
}

/** a <= b under the lattice's order, i.e. join(a, b) = b. */
export function latticeLeq(lattice:Lattice, a:RawValue, b:RawValue):boolean {
  return latticeEquals(lattice, lattice.join(a, b), b);
}

//---------------------------------------------------------------------
// Join engine
//---------------------------------------------------------------------

export type MergeResult = {changed:boolean, value:RawValue};

// Given the stored value (if any) and a candidate, figure out what should be
// stored. An absent key always takes the candidate. Otherwise we only report
// a change if the join actually moved the value; a candidate that is already
// dominated leaves everything as it was.
export function mergeValue(lattice:Lattice, stored:RawValue|undefined, candidate:RawValue):MergeResult {
  if(stored === undefined) return {changed: true, value: candidate};
  let merged = lattice.join(candidate, stored);
  if(latticeEquals(lattice, merged, stored)) return {changed: false, value: stored};
  return {changed: true, value: merged};
}

//---------------------------------------------------------------------
// Built-in lattices
//---------------------------------------------------------------------

function expectNumber(lattice:string, value:RawValue):number {
  if(!isNumber(value)) throw new TypeError(`${lattice} lattice expects numbers, got ${valueKey(value)}`);
  return value;
}

function expectBoolean(lattice:string, value:RawValue):boolean {
  if(typeof value !== "boolean") throw new TypeError(`${lattice} lattice expects booleans, got ${valueKey(value)}`);
  return value;
}

function expectArray(lattice:string, value:RawValue):RawValue[] {
  if(!isRawArray(value)) throw new TypeError(`${lattice} lattice expects arrays, got ${valueKey(value)}`);
  return value;
}

/** Smaller is better: join keeps the minimum. */
export const Min:Lattice = {
  name: "min",
  join: (a, b) => Math.min(expectNumber("min", a), expectNumber("min", b)),
  meet: (a, b) => Math.max(expectNumber("min", a), expectNumber("min", b)),
};

export const Max:Lattice = {
  name: "max",
  join: (a, b) => Math.max(expectNumber("max", a), expectNumber("max", b)),
  meet: (a, b) => Math.min(expectNumber("max", a), expectNumber("max", b)),
};

export const Or:Lattice = {
  name: "or",
  join: (a, b) => expectBoolean("or", a) || expectBoolean("or", b),
  meet: (a, b) => expectBoolean("or", a) && expectBoolean("or", b),
};

export const And:Lattice = {
  name: "and",
  join: (a, b) => expectBoolean("and", a) && expectBoolean("and", b),
  meet: (a, b) => expectBoolean("and", a) || expectBoolean("and", b),
};

function canonicalSet(items:RawValue[]):RawValue[] {
  let seen:{[key:string]: boolean} = {};
  let result:RawValue[] = [];
  for(let item of items) {
    let key = valueKey(item);
    if(seen[key]) continue;
    seen[key] = true;
    result.push(item);
  }
  return result.sort(compareValues);
}

// Arrays are treated as sets. Results are deduplicated and sorted so that
// two unions of the same elements are structurally equal.
export const SetUnion:Lattice = {
  name: "set",
  join: (a, b) => canonicalSet(expectArray("set", a).concat(expectArray("set", b))),
  meet: (a, b) => {
    let right:{[key:string]: boolean} = {};
    for(let item of expectArray("set", b)) right[valueKey(item)] = true;
    return canonicalSet(expectArray("set", a).filter((item) => right[valueKey(item)]));
  },
  equals: (a, b) => valuesEqual(canonicalSet(expectArray("set", a)), canonicalSet(expectArray("set", b))),
};

/** Flips a lattice's order, so join becomes the inner lattice's meet. */
export function dual(inner:Lattice):Lattice {
  const meet = inner.meet;
  if(!meet) throw new TypeError(`Unable to take the dual of '${inner.name}': it has no meet.`);
  return {
    name: `dual(${inner.name})`,
    join: (a, b) => meet.call(inner, a, b),
    meet: (a, b) => inner.join(a, b),
    equals: (a, b) => latticeEquals(inner, a, b),
  };
}

/** Component-wise lattice over fixed-length arrays. */
export function product(...parts:Lattice[]):Lattice {
  let name = `product(${parts.map((part) => part.name).join(", ")})`;
  let components = (value:RawValue):RawValue[] => {
    let items = expectArray(name, value);
    if(items.length !== parts.length) {
      throw new TypeError(`${name} expects ${parts.length} components, got ${items.length}`);
    }
    return items;
  };
  return {
    name,
    join: (a, b) => {
      let left = components(a);
      let right = components(b);
      return parts.map((part, ix) => part.join(left[ix], right[ix]));
    },
    equals: (a, b) => {
      let left = components(a);
      let right = components(b);
      return parts.every((part, ix) => latticeEquals(part, left[ix], right[ix]));
    },
  };
}
