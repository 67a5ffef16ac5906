import test from "tape";
import {parseArgs, resultsTable, columnHeaders, main} from "../src/cli";

function capture() {
  let out:string[] = [];
  let err:string[] = [];
  return {
    out, err,
    log: (text:string) => { out.push(text); },
    error: (text:string) => { err.push(text); },
    lines: () => out.join("\n").split("\n"),
  };
}

test("CLI: parsing arguments", (assert) => {
  let opts = parseArgs(["paths", "--timing", "-r", "path", "-r", "edge", "--timeout", "50"]);
  assert.deepEqual(opts, {
    program: "paths",
    timing: true,
    naive: false,
    timeout: 50,
    relations: ["path", "edge"],
    help: false,
  });
  let bare = parseArgs([]);
  assert.equal(bare.program, undefined);
  assert.equal(bare.timeout, undefined);
  assert.deepEqual(bare.relations, []);
  assert.equal(parseArgs(["grades", "--naive", "--relation", "honors"]).naive, true);
  assert.ok(Number.isNaN(parseArgs(["paths", "-t", "abc"]).timeout), "a timeout that isn't a number is left for main to reject");
  assert.end();
});

test("CLI: column headers", (assert) => {
  assert.deepEqual(columnHeaders({kind: "relation", name: "edge", columns: ["number", "any"]}), ["0:number", "1:any"]);
  assert.end();
});

test("CLI: result tables", (assert) => {
  assert.equal(resultsTable([], []), "No results");
  let lines = resultsTable(["0:number", "1:number"], [[1, 2]]).split("\n");
  let row = "│ 1" + " ".repeat(8) + "│ 2" + " ".repeat(8) + "│";
  assert.ok(lines.indexOf(row) > -1, "the fact is rendered as a row");
  let strings = resultsTable(["0:any"], [["ann"]]).split("\n");
  assert.ok(strings.indexOf("│ ann   │") > -1, "strings print without quotes");
  assert.end();
});

test("CLI: printing a bundled program", (assert) => {
  let io = capture();
  assert.equal(main(["paths", "--relation", "path"], io.log, io.error), 0);
  assert.deepEqual(io.err, []);
  let lines = io.lines();
  assert.ok(lines.indexOf("│ 5" + " ".repeat(8) + "│ 6" + " ".repeat(8) + "│") > -1, "path (5, 6) is shown");
  assert.end();
});

test("CLI: timing out shows partial results", (assert) => {
  let io = capture();
  assert.equal(main(["paths", "--timeout", "0", "-r", "path"], io.log, io.error), 0);
  assert.ok(io.out[0].indexOf("Timed out after 0ms; showing partial results.") > -1);
  assert.ok(io.lines().indexOf("No results") > -1, "nothing was derived");
  assert.end();
});

test("CLI: bad input", (assert) => {
  let io = capture();
  assert.equal(main(["nope"], io.log, io.error), 1);
  assert.ok(io.err[0].indexOf("Unknown program 'nope'.") > -1);

  io = capture();
  assert.equal(main(["paths", "--relation", "nope"], io.log, io.error), 1);
  assert.ok(io.err[0].indexOf("Unknown relation 'nope' in 'paths'.") > -1);

  io = capture();
  assert.equal(main(["paths", "--timeout", "abc"], io.log, io.error), 1);
  assert.ok(io.err[0].indexOf("--timeout expects a number of milliseconds.") > -1);

  io = capture();
  assert.equal(main([], io.log, io.error), 1);
  assert.equal(io.out[0].split("\n")[0], "Usage: fixpoint <program> [--timing] [--naive] [--timeout ms] [--relation name]");

  io = capture();
  assert.equal(main(["--help"], io.log, io.error), 0);
  assert.end();
});
