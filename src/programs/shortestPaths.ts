import {Program} from "../runtime/dsl";
import {Min} from "../runtime/lattices";
import {Config} from "../config";
import {RawValue} from "../runtime/values";

// ~~~
// Shortest distances, kept in a lattice whose join is the minimum:
//   shortest_path(x, y, w)     <- edge(x, y, w)
//   shortest_path(x, z, w + l) <- edge(x, y, w), shortest_path(y, z, l)
// ~~~

export const sampleWeightedEdges:[string, string, number][] = [
  ["a", "b", 4],
  ["a", "c", 1],
  ["c", "b", 2],
  ["b", "d", 5],
  ["c", "d", 8],
  ["d", "a", 3],
];

export function shortestPaths(edges:[RawValue, RawValue, number][] = sampleWeightedEdges, options:Config = {}) {
  let prog = new Program("shortest-paths", options);
  prog.relation("edge", ["any", "any", "number"]);
  prog.lattice("shortest_path", ["any", "any", "number"], Min);

  prog.rule("direct edge", ({vars, find, record}) => {
    let {x, y, w} = vars;
    find("edge", x, y, w);
    return record("shortest_path", x, y, w);
  });

  prog.rule("edge then shortest path", ({vars, find, math, record}) => {
    let {x, y, z, w, l} = vars;
    find("edge", x, y, w);
    find("shortest_path", y, z, l);
    return record("shortest_path", x, z, math.add(w, l));
  });

  prog.insert("edge", edges);
  return prog;
}
