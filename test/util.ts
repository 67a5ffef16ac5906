import type {Test} from "tape";
import {Program} from "../src/runtime/dsl";
import {Tuple, tupleKey, compareTuples} from "../src/runtime/values";

export function catchError(func:() => unknown):unknown {
  try {
    func();
  } catch(e) {
    return e;
  }
  return;
}

// Facts come back sorted, so the expected tuples can be given in any order.
export function verify(assert:Test, prog:Program, relation:string, expected:Tuple[]) {
  let actual = prog.facts(relation);
  assert.deepEqual(actual, expected.slice().sort(compareTuples), `${relation} holds the expected facts`);
}

export function isSubset(smaller:Tuple[], larger:Tuple[]) {
  let keys:{[key:string]: boolean} = {};
  for(let tuple of larger) keys[tupleKey(tuple)] = true;
  return smaller.every((tuple) => keys[tupleKey(tuple)]);
}

export function snapshot(prog:Program):{[relation:string]: Tuple[]} {
  let result:{[relation:string]: Tuple[]} = {};
  for(let declaration of prog.declarations) {
    result[declaration.name] = prog.facts(declaration.name);
  }
  return result;
}

// A small Lehmer generator, so the generated graphs are the same on every run.
// The seed has to be positive.
export function randomEdges(seed:number, nodes:number, count:number):[number, number][] {
  let state = seed;
  let next = () => {
    state = (state * 48271) % 2147483647;
    return state;
  };
  let edges:[number, number][] = [];
  for(let ix = 0; ix < count; ix++) {
    edges.push([next() % nodes, next() % nodes]);
  }
  return edges;
}

export function randomWeightedEdges(seed:number, nodes:number, count:number):[number, number, number][] {
  return randomEdges(seed, nodes, count).map(([from, to], ix):[number, number, number] => [from, to, 1 + (ix * 7 + seed) % 10]);
}
