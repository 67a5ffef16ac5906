import {Program} from "../runtime/dsl";
import {Config} from "../config";

// ~~~
// Two strata: `reachable` has to settle before `unreachable` can negate it.
//   reachable(x, y)   <- edge(x, y)
//   reachable(x, z)   <- reachable(x, y), edge(y, z)
//   unreachable(x, y) <- node(x), node(y), not reachable(x, y)
// ~~~

export interface Graph {
  nodes:string[],
  edges:[string, string][],
}

export const sampleGraph:Graph = {
  nodes: ["home", "office", "park", "shop"],
  edges: [["home", "office"], ["office", "shop"], ["shop", "office"], ["park", "home"]],
};

export function reachability(graph:Graph = sampleGraph, options:Config = {}) {
  let prog = new Program("reachability", options);
  prog.relation("node", ["string"]);
  prog.relation("edge", ["string", "string"]);
  prog.relation("reachable", ["string", "string"]);
  prog.relation("unreachable", ["string", "string"]);

  prog.rule("edges are reachable", ({vars, find, record}) => {
    let {x, y} = vars;
    find("edge", x, y);
    return record("reachable", x, y);
  });

  prog.rule("follow an edge", ({vars, find, record}) => {
    let {x, y, z} = vars;
    find("reachable", x, y);
    find("edge", y, z);
    return record("reachable", x, z);
  });

  prog.rule("everything else is unreachable", ({vars, find, not, record}) => {
    let {x, y} = vars;
    find("node", x);
    find("node", y);
    not("reachable", x, y);
    return record("unreachable", x, y);
  });

  prog.insert("node", graph.nodes.map((node) => [node]));
  prog.insert("edge", graph.edges);
  return prog;
}
