import test from "tape";
import {Program} from "../src/runtime/dsl";
import {RawValue} from "../src/runtime/values";
import {sum, count, min, max, mean, percentile} from "../src/runtime/aggregates";
import {Aggregator} from "../src/runtime/ir";
import {EvaluationError} from "../src/runtime/errors";
import {grades} from "../src/programs/grades";
import {verify, catchError} from "./util";

function apply(aggregator:Aggregator, values:RawValue[]):RawValue[] {
  return Array.from(aggregator(values.map((value) => [value])));
}

test("Aggregate: built-in aggregators", (assert) => {
  assert.deepEqual(apply(sum, [1, 2, 3]), [6]);
  assert.deepEqual(apply(count, [1, 1, 1]), [3]);
  assert.deepEqual(apply(min, [3, 1, 2]), [1]);
  assert.deepEqual(apply(max, [3, 1, 2]), [3]);
  assert.deepEqual(apply(max, ["b", "a"]), ["b"]);
  assert.deepEqual(apply(mean, [1, 2, 6]), [3]);
  assert.end();
});

test("Aggregate: empty input", (assert) => {
  assert.deepEqual(apply(sum, []), [0]);
  assert.deepEqual(apply(count, []), [0]);
  assert.deepEqual(apply(min, []), []);
  assert.deepEqual(apply(max, []), []);
  assert.deepEqual(apply(mean, []), []);
  assert.deepEqual(apply(percentile(50), []), []);
  assert.end();
});

test("Aggregate: nearest-rank percentiles", (assert) => {
  let values = [5, 1, 3, 2];
  assert.deepEqual(apply(percentile(0), values), [1]);
  assert.deepEqual(apply(percentile(50), values), [3]);
  assert.deepEqual(apply(percentile(75), values), [5]);
  assert.deepEqual(apply(percentile(100), values), [5]);
  let error = catchError(() => percentile(101));
  assert.ok(error instanceof RangeError);
  assert.end();
});

test("Aggregate: numeric aggregators reject other values", (assert) => {
  let error = catchError(() => apply(sum, [1, "two"]));
  assert.ok(error instanceof TypeError);
  if(error instanceof TypeError) {
    assert.equal(error.message, "sum expects numbers, got \"two\"");
  }
  assert.end();
});

test("Aggregate: mean grade per student", (assert) => {
  let prog = grades([[1, 10, 90], [1, 20, 70]]);
  prog.run();
  verify(assert, prog, "avg_grade", [[1, 80]]);
  assert.end();
});

test("Aggregate: grades program", (assert) => {
  let prog = grades();
  prog.run();
  verify(assert, prog, "top_grade", [[1, 90], [2, 95], [3, 61]]);
  verify(assert, prog, "course_count", [[1, 2], [2, 3], [3, 1]]);
  verify(assert, prog, "course_median", [[10, 95], [20, 88], [30, 79]]);
  verify(assert, prog, "honors", [[2]]);
  verify(assert, prog, "regular", [[1], [3]]);
  assert.equal(prog.facts("avg_grade").length, 3);
  assert.end();
});

test("Aggregate: bound grouping variables filter, and an empty group still counts", (assert) => {
  let prog = new Program("test");
  prog.relation("student", 1);
  prog.relation("grade", 3);
  prog.relation("graded", 2);
  prog.relation("total", 1);
  prog.rule("grades per student", ({vars, _, find, gather, record}) => {
    let {s, g} = vars;
    find("student", s);
    let n = gather("grade", s, _, g).count(g);
    return record("graded", s, n);
  });
  prog.rule("total grades", ({vars, _, gather, record}) => {
    let {g} = vars;
    return record("total", gather("grade", _, _, g).sum(g));
  });
  prog.insert("student", [[1], [2], [9]]);
  prog.insert("grade", [[1, 10, 90], [1, 20, 70], [2, 10, 95], [2, 20, 88], [2, 30, 79]]);
  prog.run();
  verify(assert, prog, "graded", [[1, 2], [2, 3], [9, 0]]);
  verify(assert, prog, "total", [[422]]);
  assert.end();
});

test("Aggregate: an aggregate over an empty relation without groups", (assert) => {
  let prog = new Program("test");
  prog.relation("item", 1);
  prog.relation("items", 1);
  prog.relation("cheapest", 1);
  prog.rule("count items", ({vars, gather, record}) => {
    let {i} = vars;
    return record("items", gather("item", i).count(i));
  });
  prog.rule("cheapest item", ({vars, gather, record}) => {
    let {i} = vars;
    return record("cheapest", gather("item", i).min(i));
  });
  prog.run();
  verify(assert, prog, "items", [[0]]);
  verify(assert, prog, "cheapest", []);
  assert.end();
});

test("Aggregate: results can be matched against a pattern", (assert) => {
  let prog = new Program("test");
  prog.relation("score", 2);
  prog.relation("perfect", 1);
  prog.rule("perfect scores", ({vars, gather, compare, record}) => {
    let {p, v} = vars;
    let best = gather("score", p, v).max(v);
    compare.eq(best, 100);
    return record("perfect", p);
  });
  prog.insert("score", [["ann", 100], ["ann", 80], ["bob", 90]]);
  prog.run();
  verify(assert, prog, "perfect", [["ann"]]);
  assert.end();
});

test("Aggregate: custom aggregators", (assert) => {
  let distinct:Aggregator = (rows) => {
    let seen:{[key:string]: boolean} = {};
    let result:RawValue[] = [];
    for(let [value] of rows) {
      if(seen[String(value)]) continue;
      seen[String(value)] = true;
      result.push(value);
    }
    return result;
  };
  let prog = new Program("test");
  prog.relation("visit", 2);
  prog.relation("visited", 2);
  prog.rule("distinct cities", ({vars, gather, record}) => {
    let {who, city} = vars;
    return record("visited", who, gather("visit", who, city).using(distinct, "distinct", city));
  });
  prog.insert("visit", [["ann", "oslo"], ["ann", "rome"], ["bob", "oslo"]]);
  prog.run();
  verify(assert, prog, "visited", [["ann", "oslo"], ["ann", "rome"], ["bob", "oslo"]]);
  assert.end();
});

test("Aggregate: faults inside an aggregator name the rule", (assert) => {
  let prog = new Program("test");
  prog.relation("value", 1);
  prog.relation("total", 1);
  prog.rule("sum values", ({vars, gather, record}) => {
    let {v} = vars;
    return record("total", gather("value", v).sum(v));
  });
  prog.insert("value", [[1], ["two"]]);
  let error = catchError(() => prog.run());
  assert.ok(error instanceof EvaluationError);
  if(error instanceof EvaluationError) {
    assert.equal(error.message, "rule 'sum values': sum expects numbers, got \"two\"");
  }
  assert.end();
});
