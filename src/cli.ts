#!/usr/bin/env node

import minimist from "minimist";
import Table from "cli-table";
import * as colors from "colors/safe";
import {Strategy} from "./config";
import {Tuple, printValue} from "./runtime/values";
import {Declaration} from "./runtime/ir";
import {EngineError} from "./runtime/errors";
import {programs} from "./programs";

//---------------------------------------------------------------------
// Arguments
//---------------------------------------------------------------------

export interface CliOptions {
  program?:string,
  timing:boolean,
  naive:boolean,
  timeout?:number,
  relations:string[],
  help:boolean,
}

export function parseArgs(argv:string[]):CliOptions {
  let args = minimist(argv, {
    boolean: ["timing", "naive", "help"],
    string: ["relation", "timeout"],
    alias: {h: "help", r: "relation", t: "timeout"},
  });
  let relation:unknown = args["relation"];
  let relations:string[] = [];
  if(typeof relation === "string") relations.push(relation);
  else if(Array.isArray(relation)) relations.push(...relation.map(String));
  let timeout:unknown = args["timeout"];
  let ms = typeof timeout === "string" && timeout !== "" ? Number(timeout) : undefined;
  return {
    program: args._.length ? String(args._[0]) : undefined,
    timing: !!args["timing"],
    naive: !!args["naive"],
    timeout: ms,
    relations,
    help: !!args["help"],
  };
}

export function usage():string {
  let lines = ["Usage: fixpoint <program> [--timing] [--naive] [--timeout ms] [--relation name]", "", "Programs:"];
  for(let name of Object.keys(programs)) {
    let found = programs[name];
    if(found) lines.push(`  ${name}  ${found.description}`);
  }
  return lines.join("\n");
}

//---------------------------------------------------------------------
// Tables
//---------------------------------------------------------------------

export function columnHeaders(declaration:Declaration):string[] {
  let headers = declaration.columns.map((type, ix) => `${ix}:${type}`);
  if(declaration.kind === "lattice") headers[headers.length - 1] = `value:${declaration.lattice.name}`;
  return headers;
}

export function resultsTable(headers:string[], tuples:Tuple[]):string {
  if(!tuples.length) return "No results";
  let table = new Table({head: headers, style: {head: [], border: []}});
  for(let tuple of tuples) {
    table.push(tuple.map(printValue));
  }
  return table.toString();
}

//---------------------------------------------------------------------
// Main
//---------------------------------------------------------------------

export type Output = (text:string) => void;

export function main(argv:string[], log:Output = console.log, error:Output = console.error):number {
  let opts = parseArgs(argv);
  if(opts.help || !opts.program) {
    log(usage());
    return opts.help ? 0 : 1;
  }
  let found = programs[opts.program];
  if(!found) {
    error(colors.red(`Unknown program '${opts.program}'.`));
    error(usage());
    return 1;
  }
  if(opts.timeout !== undefined && !(opts.timeout >= 0)) {
    error(colors.red(`--timeout expects a number of milliseconds.`));
    return 1;
  }

  try {
    let prog = found.create({timing: opts.timing, strategy: opts.naive ? Strategy.naive : Strategy.seminaive});
    let complete = opts.timeout === undefined ? prog.run() : prog.runWithTimeout(opts.timeout);
    if(!complete) log(colors.yellow(`Timed out after ${opts.timeout}ms; showing partial results.`));

    let shown = opts.relations.length ? opts.relations : prog.declarations.map((declaration) => declaration.name);
    for(let name of shown) {
      let declaration = prog.declarations.find((candidate) => candidate.name === name);
      if(!declaration) {
        error(colors.red(`Unknown relation '${name}' in '${opts.program}'.`));
        return 1;
      }
      log(colors.magenta(name));
      log(resultsTable(columnHeaders(declaration), prog.facts(name)));
      log("");
    }
    if(opts.timing) {
      log(colors.gray(prog.report()));
    }
    return 0;
  } catch(e) {
    if(e instanceof EngineError) {
      error(colors.red(e.message));
      return 1;
    }
    throw e;
  }
}

if(require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
