import test from "tape";
import {paths} from "../src/programs/paths";
import {shortestPaths} from "../src/programs/shortestPaths";
import {snapshot, isSubset, randomEdges, verify} from "./util";

test("Timeout: an expired deadline stops before the first iteration", (assert) => {
  let prog = paths([[1, 2], [2, 3]]);
  let iterations = 0;
  prog.onIteration(() => iterations++);
  assert.equal(prog.runWithTimeout(0), false);
  assert.equal(iterations, 0);
  verify(assert, prog, "path", []);
  assert.equal(prog.compile().complete, false);
  assert.end();
});

test("Timeout: a partial run is a subset of the full run", (assert) => {
  let edges = randomEdges(11, 12, 24);
  let full = paths(edges);
  full.run();

  let partial = paths(edges);
  let stopAfter = 2;
  let seen = 0;
  // Burn the deadline from inside the run, so the cut happens at a known
  // iteration regardless of how fast the machine is.
  let deadline = 20;
  partial.onIteration((info) => {
    if(info.stratum !== 1) return;
    seen++;
    if(seen === stopAfter) {
      let start = Date.now();
      while(Date.now() - start <= deadline) {}
    }
  });
  assert.equal(partial.runWithTimeout(deadline), false);
  let partialPaths = partial.facts("path");
  assert.ok(partialPaths.length < full.facts("path").length, "stopped before the fixpoint");
  assert.ok(isSubset(partialPaths, full.facts("path")), "everything derived is in the full result");
  assert.end();
});

test("Timeout: lattice values of a partial run are no better than the full run", (assert) => {
  let full = shortestPaths();
  full.run();
  let partial = shortestPaths();
  let deadline = 20;
  partial.onIteration((info) => {
    if(info.stratum === 1 && info.iteration === 0) {
      let start = Date.now();
      while(Date.now() - start <= deadline) {}
    }
  });
  assert.equal(partial.runWithTimeout(deadline), false);
  for(let [from, to, value] of partial.facts("shortest_path")) {
    let best = full.value("shortest_path", from, to);
    assert.ok(typeof value === "number" && typeof best === "number" && value >= best, `${from} -> ${to}: ${value} >= ${best}`);
  }
  assert.end();
});

test("Timeout: a generous deadline gives the full result", (assert) => {
  let edges = randomEdges(3, 10, 20);
  let full = paths(edges);
  full.run();
  let bounded = paths(edges);
  assert.equal(bounded.runWithTimeout(60000), true);
  assert.deepEqual(snapshot(bounded), snapshot(full));
  assert.end();
});

test("Timeout: an interrupted program finishes on the next run", (assert) => {
  let edges = randomEdges(17, 10, 20);
  let full = paths(edges);
  full.run();
  let prog = paths(edges);
  assert.equal(prog.runWithTimeout(0), false);
  assert.equal(prog.run(), true);
  assert.deepEqual(snapshot(prog), snapshot(full));
  assert.end();
});
