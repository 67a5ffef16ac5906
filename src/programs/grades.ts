import {Program} from "../runtime/dsl";
import {Config} from "../config";

// ~~~
// Per-student and per-course statistics over course_grade(student, course, grade):
//   avg_grade(s, m)      <- m = mean(g) in course_grade(s, _, g)
//   top_grade(s, m)      <- m = max(g) in course_grade(s, _, g)
//   course_count(s, n)   <- n = count(c) in course_grade(s, c, _)
//   course_median(c, p)  <- p = percentile(50, g) in course_grade(_, c, g)
//   honors(s)            <- avg_grade(s, m), m >= 85
//   regular(s)           <- avg_grade(s, _), not honors(s)
// ~~~

export const sampleGrades:[number, number, number][] = [
  [1, 10, 90],
  [1, 20, 70],
  [2, 10, 95],
  [2, 20, 88],
  [2, 30, 79],
  [3, 30, 61],
];

export function grades(rows:[number, number, number][] = sampleGrades, options:Config = {}) {
  let prog = new Program("grades", options);
  prog.relation("course_grade", ["number", "number", "number"]);
  prog.relation("avg_grade", ["number", "number"]);
  prog.relation("top_grade", ["number", "number"]);
  prog.relation("course_count", ["number", "number"]);
  prog.relation("course_median", ["number", "number"]);
  prog.relation("honors", ["number"]);
  prog.relation("regular", ["number"]);

  prog.rule("average grade", ({vars, _, gather, record}) => {
    let {s, g} = vars;
    let m = gather("course_grade", s, _, g).mean(g);
    return record("avg_grade", s, m);
  });

  prog.rule("top grade", ({vars, _, gather, record}) => {
    let {s, g} = vars;
    let m = gather("course_grade", s, _, g).max(g);
    return record("top_grade", s, m);
  });

  prog.rule("courses taken", ({vars, _, gather, record}) => {
    let {s, c} = vars;
    let n = gather("course_grade", s, c, _).count(c);
    return record("course_count", s, n);
  });

  prog.rule("course median", ({vars, _, gather, record}) => {
    let {c, g} = vars;
    let p = gather("course_grade", _, c, g).percentile(50, g);
    return record("course_median", c, p);
  });

  prog.rule("honors students", ({vars, find, compare, record}) => {
    let {s, m} = vars;
    find("avg_grade", s, m);
    compare.gte(m, 85);
    return record("honors", s);
  });

  prog.rule("everyone else", ({vars, _, find, not, record}) => {
    let {s} = vars;
    find("avg_grade", s, _);
    not("honors", s);
    return record("regular", s);
  });

  prog.insert("course_grade", rows);
  return prog;
}
