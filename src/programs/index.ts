import {Program} from "../runtime/dsl";
import {Config} from "../config";
import {paths} from "./paths";
import {shortestPaths} from "./shortestPaths";
import {reachability} from "./reachability";
import {grades} from "./grades";

export interface BundledProgram {
  description:string,
  create:(options:Config) => Program,
}

export const programs:{[name:string]: BundledProgram|undefined} = {
  "paths": {
    description: "transitive closure over a small directed graph",
    create: (options) => paths(undefined, options),
  },
  "shortest-paths": {
    description: "shortest distances kept in a min lattice",
    create: (options) => shortestPaths(undefined, options),
  },
  "reachability": {
    description: "reachable and unreachable node pairs, using negation",
    create: (options) => reachability(undefined, options),
  },
  "grades": {
    description: "per-student and per-course grade aggregates",
    create: (options) => grades(undefined, options),
  },
};

export {paths, shortestPaths, reachability, grades};
