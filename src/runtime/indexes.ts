import {RawValue, Tuple, tupleKey, valueKey, valuesEqual, isNumber} from "./values";
import {ColumnType, Declaration, LatticeDeclaration, RelationDeclaration} from "./ir";
import {Lattice, mergeValue} from "./lattices";
import {EvaluationError, ProgramError} from "./errors";

//------------------------------------------------------------------------
// Views
//------------------------------------------------------------------------

// Every committed entry remembers the generation it was committed in, and
// every commit starts a new generation. That gives us the three views the
// semi-naive evaluator needs without copying anything:
//
//   full   - everything committed so far
//   delta  - only what the latest commit introduced (or raised, for lattices)
//   stable - everything committed before the latest commit
//
// Staged candidates are invisible to all three until the next commit.
export type View = "full"|"delta"|"stable";

/** Per column, the value a lookup requires, or undefined for a free column. */
export type Bound = (RawValue|undefined)[];

export class Entry {
  constructor(public tuple:Tuple, public generation:number) {}
}

//------------------------------------------------------------------------
// Indexes
//------------------------------------------------------------------------

export interface FactIndex {
  readonly name:string;
  readonly arity:number;
  readonly declaration:Declaration;
  readonly generation:number;
  readonly size:number;
  insert(tuple:Tuple):void;
  commit():boolean;
  lookup(bound:Bound, view:View):IterableIterator<Tuple>;
  check(bound:Bound, view:View):boolean;
  has(tuple:Tuple):boolean;
  tuples():Tuple[];
}

abstract class EntryIndex<D extends Declaration> implements FactIndex {
  generation = 0;
  protected entries = new Map<string, Entry>();
  protected recent:Entry[] = [];
  // One hash per combination of bound columns, built the first time a lookup
  // asks for it and kept up to date on every commit after that.
  protected hashes = new Map<string, Map<string, Entry[]>>();

  constructor(public declaration:D) {}

  get name() {
    return this.declaration.name;
  }

  get arity() {
    return this.declaration.columns.length;
  }

  get size() {
    return this.entries.size;
  }

  abstract insert(tuple:Tuple):void;
  abstract commit():boolean;
  abstract has(tuple:Tuple):boolean;

  // Which of the bound columns the hashes can be keyed on.
  protected abstract indexable(column:number):boolean;

  protected visible(entry:Entry, view:View) {
    if(view === "full") return true;
    if(view === "delta") return entry.generation === this.generation;
    return entry.generation < this.generation;
  }

  protected matches(tuple:Tuple, bound:Bound) {
    for(let ix = 0; ix < bound.length; ix++) {
      let value = bound[ix];
      if(value !== undefined && !valuesEqual(tuple[ix], value)) return false;
    }
    return true;
  }

  protected maskKey(columns:number[]) {
    return columns.join(",");
  }

  protected hashKey(tuple:Bound, columns:number[]) {
    let parts:string[] = [];
    for(let column of columns) {
      let value = tuple[column];
      parts.push(value === undefined ? "?" : valueKey(value));
    }
    return parts.join("|");
  }

  protected getOrCreateHash(columns:number[]) {
    let mask = this.maskKey(columns);
    let found = this.hashes.get(mask);
    if(!found) {
      found = new Map();
      for(let entry of this.entries.values()) {
        this.hashEntry(found, columns, entry);
      }
      this.hashes.set(mask, found);
    }
    return found;
  }

  protected hashEntry(hash:Map<string, Entry[]>, columns:number[], entry:Entry) {
    let key = this.hashKey(entry.tuple, columns);
    let bucket = hash.get(key);
    if(!bucket) {
      bucket = [];
      hash.set(key, bucket);
    }
    bucket.push(entry);
  }

  protected indexEntry(entry:Entry) {
    for(let [mask, hash] of this.hashes) {
      let columns = mask.split(",").map((column) => +column);
      this.hashEntry(hash, columns, entry);
    }
  }

  protected candidates(bound:Bound, view:View):Iterable<Entry> {
    let columns:number[] = [];
    for(let ix = 0; ix < bound.length; ix++) {
      if(bound[ix] !== undefined && this.indexable(ix)) columns.push(ix);
    }
    if(!columns.length) {
      return view === "delta" ? this.recent : this.entries.values();
    }
    // The delta is usually much smaller than anything a hash bucket could
    // narrow the full relation down to.
    if(view === "delta" && this.recent.length < 16) return this.recent;
    return this.getOrCreateHash(columns).get(this.hashKey(bound, columns)) || [];
  }

  *lookup(bound:Bound, view:View):IterableIterator<Tuple> {
    for(let entry of this.candidates(bound, view)) {
      if(!this.visible(entry, view)) continue;
      if(!this.matches(entry.tuple, bound)) continue;
      yield entry.tuple;
    }
  }

  check(bound:Bound, view:View):boolean {
    for(let entry of this.candidates(bound, view)) {
      if(this.visible(entry, view) && this.matches(entry.tuple, bound)) return true;
    }
    return false;
  }

  tuples():Tuple[] {
    let result:Tuple[] = [];
    for(let entry of this.entries.values()) {
      result.push(entry.tuple);
    }
    return result;
  }
}

//------------------------------------------------------------------------
// RelationIndex
//------------------------------------------------------------------------

export class RelationIndex extends EntryIndex<RelationDeclaration> {
  protected pending = new Map<string, Tuple>();

  protected indexable(column:number) {
    return true;
  }

  insert(tuple:Tuple) {
    let key = tupleKey(tuple);
    if(this.entries.has(key) || this.pending.has(key)) return;
    this.pending.set(key, tuple);
  }

  commit():boolean {
    this.generation++;
    this.recent = [];
    for(let [key, tuple] of this.pending) {
      if(this.entries.has(key)) continue;
      let entry = new Entry(tuple, this.generation);
      this.entries.set(key, entry);
      this.recent.push(entry);
      this.indexEntry(entry);
    }
    this.pending.clear();
    return this.recent.length > 0;
  }

  has(tuple:Tuple) {
    return this.entries.has(tupleKey(tuple));
  }
}

//------------------------------------------------------------------------
// LatticeIndex
//------------------------------------------------------------------------

// A lattice index is keyed on every column but the last. Candidates for the
// same key that arrive in one iteration are joined together as they're
// staged, and the result is joined into the stored value on commit. Entries
// are updated in place, so the hashes (which only ever key on the key
// columns) never need to move them.
export class LatticeIndex extends EntryIndex<LatticeDeclaration> {
  protected pending = new Map<string, {key:Tuple, value:RawValue}>();

  get lattice():Lattice {
    return this.declaration.lattice;
  }

  protected indexable(column:number) {
    return column < this.arity - 1;
  }

  protected join(a:RawValue, b:RawValue) {
    try {
      return this.lattice.join(a, b);
    } catch(error) {
      throw EvaluationError.wrap(`lattice '${this.name}'`, error);
    }
  }

  protected merge(stored:RawValue|undefined, value:RawValue) {
    try {
      return mergeValue(this.lattice, stored, value);
    } catch(error) {
      throw EvaluationError.wrap(`lattice '${this.name}'`, error);
    }
  }

  insert(tuple:Tuple) {
    let key = tuple.slice(0, this.arity - 1);
    let value = tuple[this.arity - 1];
    let hash = tupleKey(key);
    let staged = this.pending.get(hash);
    if(staged) {
      staged.value = this.join(value, staged.value);
    } else {
      this.pending.set(hash, {key, value});
    }
  }

  commit():boolean {
    this.generation++;
    this.recent = [];
    for(let [hash, {key, value}] of this.pending) {
      let entry = this.entries.get(hash);
      let stored = entry ? entry.tuple[this.arity - 1] : undefined;
      let merged = this.merge(stored, value);
      if(!merged.changed) continue;
      let tuple = key.concat([merged.value]);
      if(entry) {
        entry.tuple = tuple;
        entry.generation = this.generation;
      } else {
        entry = new Entry(tuple, this.generation);
        this.entries.set(hash, entry);
        this.indexEntry(entry);
      }
      this.recent.push(entry);
    }
    this.pending.clear();
    return this.recent.length > 0;
  }

  get(key:Tuple):RawValue|undefined {
    let entry = this.entries.get(tupleKey(key));
    return entry ? entry.tuple[this.arity - 1] : undefined;
  }

  has(tuple:Tuple) {
    let stored = this.get(tuple.slice(0, this.arity - 1));
    return stored !== undefined && valuesEqual(stored, tuple[this.arity - 1]);
  }
}

//------------------------------------------------------------------------
// Database
//------------------------------------------------------------------------

function checkColumn(type:ColumnType, value:RawValue) {
  switch(type) {
    case "number": return isNumber(value);
    case "string": return typeof value === "string";
    case "boolean": return typeof value === "boolean";
    default: return true;
  }
}

export class Database {
  protected indexes = new Map<string, FactIndex>();

  constructor(declarations:Declaration[]) {
    for(let declaration of declarations) {
      if(this.indexes.has(declaration.name)) {
        throw new ProgramError(`Relation '${declaration.name}' is declared more than once.`);
      }
      let index = declaration.kind === "lattice" ? new LatticeIndex(declaration) : new RelationIndex(declaration);
      this.indexes.set(declaration.name, index);
    }
  }

  get(name:string):FactIndex {
    let found = this.indexes.get(name);
    if(!found) throw new ProgramError(`Unknown relation '${name}'.`);
    return found;
  }

  lattice(name:string):LatticeIndex {
    let found = this.get(name);
    if(!(found instanceof LatticeIndex)) throw new ProgramError(`'${name}' is a relation, not a lattice.`);
    return found;
  }

  names():string[] {
    return Array.from(this.indexes.keys());
  }

  // The only way facts get in from the outside. Derived facts skip these
  // checks; rule authors are on the hook for their column types.
  inject(name:string, tuple:Tuple) {
    let index = this.get(name);
    let {columns} = index.declaration;
    if(tuple.length !== columns.length) {
      throw new ProgramError(`'${name}' has ${columns.length} columns, but a fact with ${tuple.length} was given.`);
    }
    for(let ix = 0; ix < columns.length; ix++) {
      if(!checkColumn(columns[ix], tuple[ix])) {
        throw new ProgramError(`Column ${ix} of '${name}' expects a ${columns[ix]}, got ${valueKey(tuple[ix])}.`);
      }
    }
    index.insert(tuple.slice());
  }

  sizes():{[name:string]: number} {
    let sizes:{[name:string]: number} = {};
    for(let [name, index] of this.indexes) {
      sizes[name] = index.size;
    }
    return sizes;
  }
}
