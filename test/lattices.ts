import test from "tape";
import {Program} from "../src/runtime/dsl";
import {Min, Max, Or, And, SetUnion, dual, product, mergeValue, latticeLeq} from "../src/runtime/lattices";
import {EvaluationError} from "../src/runtime/errors";
import {shortestPaths} from "../src/programs/shortestPaths";
import {verify, catchError} from "./util";

test("Lattice: built-in joins", (assert) => {
  assert.equal(Min.join(3, 5), 3);
  assert.equal(Max.join(3, 5), 5);
  assert.equal(Or.join(false, true), true);
  assert.equal(And.join(false, true), false);
  assert.deepEqual(SetUnion.join([3, 1], [2, 1]), [1, 2, 3]);
  assert.deepEqual(SetUnion.join(["b"], ["a", "b"]), ["a", "b"]);
  assert.end();
});

test("Lattice: set equality ignores order and duplicates", (assert) => {
  let equals = SetUnion.equals;
  assert.ok(equals && equals([2, 1, 1], [1, 2]));
  assert.notOk(equals && equals([1], [1, 2]));
  assert.end();
});

test("Lattice: dual and product", (assert) => {
  let lowest = dual(Max);
  assert.equal(lowest.join(3, 5), 3);
  assert.equal(lowest.name, "dual(max)");

  let pair = product(Max, Or);
  assert.deepEqual(pair.join([1, false], [0, true]), [1, true]);
  assert.equal(pair.name, "product(max, or)");

  let error = catchError(() => dual(pair));
  assert.ok(error instanceof TypeError);
  if(error instanceof TypeError) {
    assert.equal(error.message, "Unable to take the dual of 'product(max, or)': it has no meet.");
  }
  assert.end();
});

test("Lattice: merging candidates into stored values", (assert) => {
  assert.deepEqual(mergeValue(Max, undefined, 3), {changed: true, value: 3});
  assert.deepEqual(mergeValue(Max, 5, 3), {changed: false, value: 5});
  assert.deepEqual(mergeValue(Max, 5, 7), {changed: true, value: 7});
  assert.deepEqual(mergeValue(SetUnion, [1, 2], [2]), {changed: false, value: [1, 2]});
  assert.ok(latticeLeq(Max, 1, 2));
  assert.notOk(latticeLeq(Min, 1, 2));
  assert.end();
});

test("Lattice: joins reject values of the wrong type", (assert) => {
  let error = catchError(() => Min.join(1, "x"));
  assert.ok(error instanceof TypeError);
  if(error instanceof TypeError) {
    assert.equal(error.message, "min lattice expects numbers, got \"x\"");
  }
  assert.end();
});

test("Lattice: shortest paths keep the minimum", (assert) => {
  let prog = shortestPaths([[1, 2, 5], [2, 3, 3]]);
  prog.run();
  assert.equal(prog.value("shortest_path", 1, 3), 8);
  assert.equal(prog.value("shortest_path", 1, 2), 5);
  assert.equal(prog.value("shortest_path", 2, 3), 3);
  assert.equal(prog.value("shortest_path", 3, 1), undefined);
  verify(assert, prog, "shortest_path", [[1, 2, 5], [1, 3, 8], [2, 3, 3]]);
  assert.end();
});

test("Lattice: a shorter route replaces a longer one", (assert) => {
  let prog = shortestPaths();
  prog.run();
  assert.equal(prog.value("shortest_path", "a", "b"), 3);
  assert.equal(prog.value("shortest_path", "c", "d"), 7);
  assert.equal(prog.value("shortest_path", "a", "d"), 8);
  assert.equal(prog.value("shortest_path", "d", "d"), 11);
  assert.end();
});

test("Lattice: values only move up the order across iterations", (assert) => {
  let prog = shortestPaths();
  let seen:number[] = [];
  prog.onIteration(() => {
    let value = prog.value("shortest_path", "a", "d");
    if(typeof value === "number") seen.push(value);
  });
  prog.run();
  assert.deepEqual(seen.slice(0, 2), [9, 8], "first found through the direct edges, then improved");
  for(let ix = 1; ix < seen.length; ix++) {
    assert.ok(seen[ix] <= seen[ix - 1], `iteration value ${seen[ix]} is no worse than ${seen[ix - 1]}`);
  }
  assert.equal(seen[seen.length - 1], 8);
  assert.end();
});

test("Lattice: set union accumulates reachable nodes", (assert) => {
  let prog = new Program("test");
  prog.relation("edge", 2);
  prog.lattice("reach", 2, SetUnion);
  prog.rule("direct", ({vars, find, compute, record}) => {
    let {x, y} = vars;
    find("edge", x, y);
    return record("reach", x, compute((value) => [value], y));
  });
  prog.rule("transitive", ({vars, find, record}) => {
    let {x, y, set} = vars;
    find("edge", x, y);
    find("reach", y, set);
    return record("reach", x, set);
  });
  prog.insert("edge", [["a", "b"], ["b", "c"], ["c", "d"]]);
  prog.run();
  assert.deepEqual(prog.value("reach", "a"), ["b", "c", "d"]);
  assert.deepEqual(prog.value("reach", "b"), ["c", "d"]);
  assert.deepEqual(prog.value("reach", "c"), ["d"]);
  assert.equal(prog.value("reach", "d"), undefined);
  assert.end();
});

test("Lattice: a faulty value is reported against the lattice", (assert) => {
  let prog = new Program("test");
  prog.lattice("dist", 2, Min);
  prog.insert("dist", [["a", "x"], ["a", 1]]);
  let error = catchError(() => prog.compile());
  assert.ok(error instanceof EvaluationError);
  if(error instanceof EvaluationError) {
    assert.equal(error.message, "lattice 'dist': min lattice expects numbers, got \"x\"");
  }
  assert.end();
});

test("Lattice: a NaN value still settles", (assert) => {
  let prog = new Program("test");
  prog.lattice("best", ["string", "number"], Max);
  prog.rule("keep the best", ({vars, find, record}) => {
    let {k, v} = vars;
    find("best", k, v);
    return record("best", k, v);
  });
  prog.insert("best", [["a", NaN]]);
  let iterations = 0;
  prog.onIteration(() => iterations++);
  assert.equal(prog.runWithTimeout(5000), true);
  assert.equal(iterations, 1);
  let value = prog.value("best", "a");
  assert.ok(typeof value === "number" && isNaN(value));
  assert.end();
});
