import {Program} from "../runtime/dsl";
import {Config} from "../config";

// ~~~
// Transitive closure over a directed graph:
//   path(x, y) <- edge(x, y)
//   path(x, z) <- edge(x, y), path(y, z)
// ~~~

export const sampleEdges:[number, number][] = [[1, 2], [2, 3], [3, 4], [4, 2], [5, 6]];

export function paths(edges:[number, number][] = sampleEdges, options:Config = {}) {
  let prog = new Program("paths", options);
  prog.relation("edge", ["number", "number"]);
  prog.relation("path", ["number", "number"]);

  prog.rule("every edge is a path", ({vars, find, record}) => {
    let {x, y} = vars;
    find("edge", x, y);
    return record("path", x, y);
  });

  prog.rule("extend a path by an edge", ({vars, find, record}) => {
    let {x, y, z} = vars;
    find("edge", x, y);
    find("path", y, z);
    return record("path", x, z);
  });

  prog.insert("edge", edges);
  return prog;
}
