//--------------------------------------------------------------
// Errors
//--------------------------------------------------------------

import {Polarity} from "./analyzer";

//--------------------------------------------------------------
// EngineError
//--------------------------------------------------------------

export class EngineError extends Error {
  type = "error";

  constructor(message:string, options?:{cause?:unknown}) {
    super(message, options);
    this.name = new.target.name;
  }
}

//--------------------------------------------------------------
// Structural errors
//--------------------------------------------------------------

// Raised while stratifying, before a single fact has been derived. The
// offending edge reads `from` with the given polarity in a rule whose head
// is `to`, and both sit in the same recursive component.
export class StratificationError extends EngineError {
  type = "stratification";

  constructor(public from:string, public to:string, public polarity:Polarity, public rule:string) {
    super(`Unable to stratify: rule '${rule}' derives '${to}' from ${polarity === "negative" ? "a negated" : "an aggregated"} ` +
          `reference to '${from}', which depends on '${to}' recursively.`);
  }
}

export class ProgramError extends EngineError {
  type = "program";
}

//--------------------------------------------------------------
// Runtime faults
//--------------------------------------------------------------

// Anything thrown by caller-supplied code (joins, aggregators, computed
// expressions, generators and filters) ends the run. The thrown value is
// kept as the cause.
export class EvaluationError extends EngineError {
  type = "evaluation";

  constructor(public site:string, message:string, cause?:unknown) {
    super(`${site}: ${message}`, {cause});
  }

  static wrap(site:string, error:unknown):EvaluationError {
    if(error instanceof EvaluationError) return error;
    let message = error instanceof Error ? error.message : String(error);
    return new EvaluationError(site, message, error);
  }
}
