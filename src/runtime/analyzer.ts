//---------------------------------------------------------------------
// Analyzer
//---------------------------------------------------------------------

import {ProgramDefinition, Declaration, Rule, BodyClause, Pattern, Expression,
        clauseRelation, isVariable, isPatternList} from "./ir";
import {ProgramError} from "./errors";

export type Polarity = "positive"|"negative"|"aggregated";

export interface DependencyEdge {
  from:string,
  to:string,
  polarity:Polarity,
  rule:string,
}

function clausePolarity(clause:BodyClause):Polarity|undefined {
  switch(clause.kind) {
    case "relation":
    case "lattice":
      return "positive";
    case "not":
      return "negative";
    case "aggregate":
      return "aggregated";
    default:
      return;
  }
}

//---------------------------------------------------------------------
// DependencyGraph
//---------------------------------------------------------------------

// Edges run from the relation a body clause reads to every relation the
// rule's head writes. Duplicates are kept, so the same pair can show up once
// as positive and once as negative; the stratifier cares about each of them.
export class DependencyGraph {
  nodes:string[] = [];
  edges:DependencyEdge[] = [];
  protected outgoing = new Map<string, DependencyEdge[]>();

  constructor(relations:string[], rules:Rule[]) {
    for(let relation of relations) {
      this.addNode(relation);
    }
    for(let rule of rules) {
      for(let clause of rule.body) {
        let from = clauseRelation(clause);
        let polarity = clausePolarity(clause);
        if(from === undefined || polarity === undefined) continue;
        for(let head of rule.head) {
          this.addEdge({from, to: head.relation, polarity, rule: rule.name});
        }
      }
    }
  }

  addNode(node:string) {
    if(this.outgoing.has(node)) return;
    this.nodes.push(node);
    this.outgoing.set(node, []);
  }

  addEdge(edge:DependencyEdge) {
    this.addNode(edge.from);
    this.addNode(edge.to);
    this.edges.push(edge);
    this.successors(edge.from).push(edge);
  }

  successors(node:string):DependencyEdge[] {
    return this.outgoing.get(node) || [];
  }
}

export function buildDependencyGraph(program:ProgramDefinition):DependencyGraph {
  return new DependencyGraph(program.declarations.map((declaration) => declaration.name), program.rules);
}

//---------------------------------------------------------------------
// Validation
//---------------------------------------------------------------------

// The engine trusts its input to be well formed; anything a front end would
// normally catch is caught here instead, before we stratify.

function validateClause(rule:Rule, clause:BodyClause, declared:Map<string, Declaration>) {
  if(clause.kind === "each" || clause.kind === "filter" || clause.kind === "let") return;
  let relation = clause.relation;
  let declaration = declared.get(relation);
  if(!declaration) {
    throw new ProgramError(`Rule '${rule.name}' references undeclared relation '${relation}'.`);
  }
  let arity = declaration.columns.length;
  if(clause.kind === "lattice") {
    if(declaration.kind !== "lattice") {
      throw new ProgramError(`Rule '${rule.name}' matches '${relation}' as a lattice, but it is a relation.`);
    }
    if(clause.keys.length !== arity - 1) {
      throw new ProgramError(`Rule '${rule.name}' matches '${relation}' with ${clause.keys.length} keys, expected ${arity - 1}.`);
    }
    return;
  }
  if(clause.kind === "relation" && declaration.kind === "lattice") {
    throw new ProgramError(`Rule '${rule.name}' matches lattice '${relation}' as a plain relation.`);
  }
  let terms = clause.terms;
  if(terms.length !== arity) {
    throw new ProgramError(`Rule '${rule.name}' uses '${relation}' with ${terms.length} columns, expected ${arity}.`);
  }
  if(clause.kind === "aggregate") {
    for(let value of clause.values) {
      if(!terms.some((term) => containsVariable(term, value.name))) {
        throw new ProgramError(`Rule '${rule.name}' aggregates '${value.name}', which '${relation}' never binds.`);
      }
    }
  }
}

function containsVariable(pattern:Pattern, name:string):boolean {
  if(isPatternList(pattern)) return pattern.some((sub) => containsVariable(sub, name));
  return isVariable(pattern) && pattern.name === name;
}

function validateHead(rule:Rule, relation:string, terms:Expression[], declared:Map<string, Declaration>) {
  let declaration = declared.get(relation);
  if(!declaration) {
    throw new ProgramError(`Rule '${rule.name}' derives undeclared relation '${relation}'.`);
  }
  if(terms.length !== declaration.columns.length) {
    throw new ProgramError(`Rule '${rule.name}' derives '${relation}' with ${terms.length} columns, expected ${declaration.columns.length}.`);
  }
}

export function validateProgram(program:ProgramDefinition) {
  let declared = new Map<string, Declaration>();
  for(let declaration of program.declarations) {
    if(declared.has(declaration.name)) {
      throw new ProgramError(`Relation '${declaration.name}' is declared more than once.`);
    }
    if(declaration.kind === "lattice" && declaration.columns.length < 1) {
      throw new ProgramError(`Lattice '${declaration.name}' needs at least a value column.`);
    }
    declared.set(declaration.name, declaration);
  }
  let ruleNames = new Set<string>();
  for(let rule of program.rules) {
    if(ruleNames.has(rule.name)) {
      throw new ProgramError(`Rule '${rule.name}' is defined more than once.`);
    }
    ruleNames.add(rule.name);
    if(!rule.head.length) {
      throw new ProgramError(`Rule '${rule.name}' has no head.`);
    }
    for(let head of rule.head) {
      validateHead(rule, head.relation, head.terms, declared);
    }
    for(let clause of rule.body) {
      validateClause(rule, clause, declared);
    }
  }
}
