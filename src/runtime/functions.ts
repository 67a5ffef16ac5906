//---------------------------------------------------------------------
// Math and comparison functions
//---------------------------------------------------------------------

import {RawValue, isNumber, valueKey, valuesEqual, compareValues} from "./values";

function numberArgs(name:string, values:RawValue[]):number[] {
  let args:number[] = [];
  for(let value of values) {
    if(!isNumber(value)) throw new TypeError(`${name} expects numbers, got ${valueKey(value)}`);
    args.push(value);
  }
  return args;
}

// Total functions produce exactly one result. The rule builder turns NaN and
// infinite results into no result at all, so dividing by zero just fails to
// match instead of deriving garbage.
export type TotalFunction = (...values:RawValue[]) => RawValue[];

function total(name:string, fn:(args:number[]) => number):TotalFunction {
  return (...values) => {
    let result = fn(numberArgs(name, values));
    if(isNaN(result) || !isFinite(result)) return [];
    return [result];
  };
}

export const add = total("add", ([a, b]) => a + b);
export const subtract = total("subtract", ([a, b]) => a - b);
export const multiply = total("multiply", ([a, b]) => a * b);
export const divide = total("divide", ([a, b]) => a / b);
export const mod = total("mod", ([a, b]) => a % b);
export const pow = total("pow", ([a, b]) => Math.pow(a, b));
export const abs = total("abs", ([a]) => Math.abs(a));
export const floor = total("floor", ([a]) => Math.floor(a));
export const ceiling = total("ceiling", ([a]) => Math.ceil(a));
export const round = total("round", ([a]) => Math.round(a));
export const min = total("min", (args) => Math.min(...args));
export const max = total("max", (args) => Math.max(...args));

// Every integer from start to end inclusive. Fractional bounds are rounded
// inward; a bound that isn't finite gives nothing.
export const range:TotalFunction = (...values) => {
  let [start, end] = numberArgs("range", values);
  if(!isFinite(start) || !isFinite(end)) return [];
  let result:number[] = [];
  for(let ix = Math.ceil(start); ix <= Math.floor(end); ix++) result.push(ix);
  return result;
};

//---------------------------------------------------------------------
// Comparisons
//---------------------------------------------------------------------

export type Test = (...values:RawValue[]) => boolean;

export const lt:Test = (a, b) => compareValues(a, b) < 0;
export const lte:Test = (a, b) => compareValues(a, b) <= 0;
export const gt:Test = (a, b) => compareValues(a, b) > 0;
export const gte:Test = (a, b) => compareValues(a, b) >= 0;
export const eq:Test = (a, b) => valuesEqual(a, b);
export const neq:Test = (a, b) => !valuesEqual(a, b);
