export enum Strategy {seminaive, naive};

export interface Config {
  // Read the clock for every stratum and rule. Iteration and pass counts are
  // always kept.
  timing?: boolean,
  // Print stratum and iteration progress to the console.
  debug?: boolean,
  strategy?: Strategy,
}

export var config:Config = {};

export function init(opts:Config) {
  if(opts.timing !== undefined) config.timing = opts.timing;
  if(opts.debug !== undefined) config.debug = opts.debug;
  if(opts.strategy !== undefined) config.strategy = opts.strategy;
}

function pick<T>(local:T|undefined, global:T|undefined, fallback:T):T {
  if(local !== undefined) return local;
  if(global !== undefined) return global;
  return fallback;
}

// Per-program options win over the global config.
export function resolve(opts:Config = {}):Required<Config> {
  return {
    timing: pick(opts.timing, config.timing, false),
    debug: pick(opts.debug, config.debug, false),
    strategy: pick(opts.strategy, config.strategy, Strategy.seminaive),
  };
}
