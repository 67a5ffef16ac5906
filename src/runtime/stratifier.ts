//-----------------------------------------------------------
// Stratifier
//-----------------------------------------------------------

import {ProgramDefinition, Rule, HeadClause} from "./ir";
import {DependencyGraph, buildDependencyGraph} from "./analyzer";
import {StratificationError} from "./errors";

export interface Stratum {
  index:number,
  relations:string[],
  rules:Rule[],
  // Whether some positive edge stays inside the stratum. Strata that aren't
  // recursive settle after a single pass.
  recursive:boolean,
}

//-----------------------------------------------------------
// Strongly connected components
//-----------------------------------------------------------

// Tarjan's algorithm. Every relation ends up in exactly one component, and a
// relation that nothing else depends on (and that depends on nothing) gets a
// component of its own.
export function stronglyConnected(graph:DependencyGraph):string[][] {
  let counter = 0;
  let indices = new Map<string, number>();
  let onStack = new Set<string>();
  let stack:string[] = [];
  let components:string[][] = [];

  let connect = (node:string) => {
    let index = counter++;
    let lowlink = index;
    indices.set(node, index);
    stack.push(node);
    onStack.add(node);

    for(let edge of graph.successors(node)) {
      let next = edge.to;
      let visited = indices.get(next);
      if(visited === undefined) {
        lowlink = Math.min(lowlink, connect(next));
      } else if(onStack.has(next)) {
        lowlink = Math.min(lowlink, visited);
      }
    }

    if(lowlink === index) {
      let component:string[] = [];
      let member:string|undefined;
      do {
        member = stack.pop();
        if(member === undefined) break;
        onStack.delete(member);
        component.push(member);
      } while(member !== node);
      components.push(component);
    }
    return lowlink;
  };

  for(let node of graph.nodes) {
    if(!indices.has(node)) connect(node);
  }
  return components;
}

//-----------------------------------------------------------
// Ordering
//-----------------------------------------------------------

// Tarjan hands components back in reverse topological order, but which of
// several independent components comes first depends on where the search
// happened to start. To keep strata predictable we re-sort the condensed
// graph with Kahn's algorithm, always taking the ready component whose
// earliest relation was declared first.
function orderComponents(graph:DependencyGraph, components:string[][]):string[][] {
  let position = new Map<string, number>();
  graph.nodes.forEach((node, ix) => position.set(node, ix));
  let positionOf = (node:string) => position.get(node) || 0;

  let componentOf = new Map<string, number>();
  let firstPosition:number[] = [];
  components.forEach((component, ix) => {
    component.sort((a, b) => positionOf(a) - positionOf(b));
    firstPosition[ix] = positionOf(component[0]);
    for(let node of component) componentOf.set(node, ix);
  });

  let incoming:number[] = components.map(() => 0);
  let downstream:number[][] = components.map(() => []);
  let seen = new Set<string>();
  for(let edge of graph.edges) {
    let from = componentOf.get(edge.from);
    let to = componentOf.get(edge.to);
    if(from === undefined || to === undefined) continue;
    if(from === to || seen.has(from + "|" + to)) continue;
    seen.add(from + "|" + to);
    incoming[to]++;
    downstream[from].push(to);
  }

  let ordered:string[][] = [];
  let ready = components.map((_, ix) => ix).filter((ix) => incoming[ix] === 0);
  while(ready.length) {
    ready.sort((a, b) => firstPosition[a] - firstPosition[b]);
    let next = ready.shift();
    if(next === undefined) break;
    ordered.push(components[next]);
    for(let to of downstream[next]) {
      incoming[to]--;
      if(incoming[to] === 0) ready.push(to);
    }
  }
  return ordered;
}

//-----------------------------------------------------------
// stratify
//-----------------------------------------------------------

// Splits the program into strata and checks that it can be evaluated at all.
// A negated or aggregated reference has to read a relation that is completely
// settled before the reading rule runs, which means its source must live in
// a strictly earlier stratum. If it doesn't, the negation or aggregation is
// part of a recursive cycle and there is no well-defined fixpoint, so we
// refuse the program before deriving anything.
export function stratify(program:ProgramDefinition, graph:DependencyGraph = buildDependencyGraph(program)):Stratum[] {
  let components = orderComponents(graph, stronglyConnected(graph));
  let strata:Stratum[] = [];
  let stratumOf = new Map<string, number>();
  components.forEach((relations, index) => {
    strata.push({index, relations, rules: [], recursive: false});
    for(let relation of relations) stratumOf.set(relation, index);
  });

  // Every node of the graph lands in exactly one component.
  let indexOf = (relation:string) => stratumOf.get(relation) || 0;

  for(let edge of graph.edges) {
    let from = indexOf(edge.from);
    let to = indexOf(edge.to);
    if(edge.polarity === "positive") {
      if(from === to) strata[to].recursive = true;
      continue;
    }
    if(from >= to) {
      throw new StratificationError(edge.from, edge.to, edge.polarity, edge.rule);
    }
  }

  // A rule whose heads land in different strata is split so that each
  // stratum only ever writes its own relations; each part re-runs the body.
  for(let rule of program.rules) {
    let byStratum = new Map<number, HeadClause[]>();
    for(let head of rule.head) {
      let index = indexOf(head.relation);
      let heads = byStratum.get(index);
      if(!heads) {
        heads = [];
        byStratum.set(index, heads);
      }
      heads.push(head);
    }
    for(let [index, heads] of byStratum) {
      strata[index].rules.push(heads.length === rule.head.length ? rule : {name: rule.name, head: heads, body: rule.body});
    }
  }

  return strata;
}
