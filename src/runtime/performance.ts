//---------------------------------------------------------------------
// Performance
//---------------------------------------------------------------------

type TimeReturn = [number, number];

export type RuleTiming = {time:number, count:number};

export type StratumTiming = {
  index:number,
  relations:string[],
  time:number,
  iterations:number,
  rules:{[rule:string]: RuleTiming},
};

export interface Summary {
  timing:boolean,
  total:number,
  strata:StratumTiming[],
}

// Rule names come from the program, so they can shadow anything an object
// inherits.
function ruleTiming(stratum:StratumTiming, name:string):RuleTiming|undefined {
  return Object.prototype.hasOwnProperty.call(stratum.rules, name) ? stratum.rules[name] : undefined;
}

export class PerformanceTracker {
  timing = true;
  strata:{[stratum:number]: StratumTiming};
  activeStratum:number;
  activeProperties:{[property:string]: TimeReturn};
  total:number;

  now: () => TimeReturn;
  elapsed: (start:TimeReturn) => number;

  constructor() {
    this.strata = {};
    this.activeStratum = -1;
    this.activeProperties = {};
    this.total = 0;
    this.now = now;
    this.elapsed = elapsed;
  }

  reset() {
    this.strata = {};
    this.activeStratum = -1;
    this.activeProperties = {};
    this.total = 0;
  }

  protected getOrCreateStratum(index:number, relations:string[]) {
    let found = this.strata[index];
    if(!found) {
      found = this.strata[index] = {index, relations: relations.slice(), time: 0, iterations: 0, rules: {}};
    }
    return found;
  }

  stratum(index:number, relations:string[]) {
    this.getOrCreateStratum(index, relations);
    this.activeStratum = index;
    this.activeProperties["stratum"] = this.now();
  }

  stratumEnd() {
    let found = this.strata[this.activeStratum];
    if(found) {
      let time = this.elapsed(this.activeProperties["stratum"]);
      found.time += time;
      this.total += time;
    }
    this.activeStratum = -1;
  }

  iteration() {
    let found = this.strata[this.activeStratum];
    if(found) found.iterations++;
  }

  rule(name:string) {
    let found = this.strata[this.activeStratum];
    if(!found) return;
    let rule = ruleTiming(found, name);
    if(!rule) rule = found.rules[name] = {time: 0, count: 0};
    rule.count++;
    this.activeProperties["rule:" + name] = this.now();
  }

  ruleEnd(name:string) {
    let found = this.strata[this.activeStratum];
    if(!found) return;
    let start = this.activeProperties["rule:" + name];
    let rule = ruleTiming(found, name);
    if(!start || !rule) return;
    rule.time += this.elapsed(start);
  }

  summary():Summary {
    let strata:StratumTiming[] = [];
    for(let key of Object.keys(this.strata)) {
      strata.push(this.strata[+key]);
    }
    strata.sort((a, b) => a.index - b.index);
    return {timing: this.timing, total: this.total, strata};
  }

  report():string {
    let {timing, total, strata} = this.summary();
    let lines:string[] = [];
    for(let stratum of strata) {
      let iterations = `${stratum.iterations} ${stratum.iterations === 1 ? "iteration" : "iterations"}`;
      let time = timing ? `${stratum.time.toFixed(3)}ms, ` : "";
      lines.push(`stratum ${stratum.index} [${stratum.relations.join(", ")}]: ${time}${iterations}`);
      for(let name of Object.keys(stratum.rules)) {
        let rule = stratum.rules[name];
        let ruleTime = timing ? `${rule.time.toFixed(3)}ms ` : "";
        lines.push(`  ${name}: ${ruleTime}(${rule.count} ${rule.count === 1 ? "pass" : "passes"})`);
      }
    }
    if(timing) lines.push(`total: ${total.toFixed(3)}ms`);
    return lines.join("\n");
  }
}

// Keeps the shape of the summary (strata, iteration and pass counts) but
// never reads the clock.
export class NoopPerformanceTracker extends PerformanceTracker {
  timing = false;

  constructor() {
    super();
    this.now = () => [0, 0];
    this.elapsed = (start:TimeReturn) => 0;
  }
}

export function now():TimeReturn {
  return process.hrtime();
}

export function elapsed(start:TimeReturn):number {
  let end = process.hrtime(start);
  return (end[0] * 1000) + (end[1] / 1000000);
}
