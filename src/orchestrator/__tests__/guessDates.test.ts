import fs from "fs";
import os from "os";
import path from "path";
import { buildConditions, runGuessCourseDates, type BatchDeps } from "../guessDates";
import { createFileCourseStore, saveCourses } from "../../store/courses";
import { createFileEstimator } from "../../store/estimates";
import { adminCapability } from "../../lib/auth";
import type { Course, GuessOptions } from "../../types/course";

const cap = adminCapability("test");
let root: string;

const opts = (over: Partial<GuessOptions> = {}): GuessOptions => ({
  guessStart: true, guessEnd: true, guessAll: false, update: false, filter: null, ...over,
});

function c(id: number, over: Partial<Course> = {}): Course {
  return { id, shortname: `c${id}`, sortorder: id, startdate: 0, enddate: 0, format: "topics", formatOptions: {}, ...over };
}

function deps(printed: string[]): BatchDeps {
  return {
    store: createFileCourseStore("t1", root),
    estimator: createFileEstimator("t1", root),
    cap,
    formatDate: (ts) => `@${ts}`,
    print: (s) => printed.push(s),
  };
}

beforeEach(async () => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), "guess-"));
  await saveCourses("t1", [
    c(1),
    c(5, { sortorder: 2 }),
    c(6, { sortorder: 1, startdate: 1500000 }),
    c(8, { sortorder: 3, shortname: "w8", format: "weeks", formatOptions: { automaticenddate: true, numsections: 1 } }),
  ], cap, root);
  fs.writeFileSync(
    path.join(root, "t1", "date_estimates.jsonl"),
    [
      { id: 1, start: 10, end: 20 },
      { id: 5, start: 1000000, end: 2000000 },
      { id: 6, start: 1500000, end: 1200000 },
      { id: 8, start: 3000000, end: 1 },
    ].map((e) => JSON.stringify(e)).join("\n") + "\n",
    "utf8"
  );
});

afterEach(() => {
  jest.restoreAllMocks();
  fs.rmSync(root, { recursive: true, force: true });
});

describe("buildConditions", () => {
  test("only unset dates unless guessall", () => {
    expect(buildConditions(opts(), 1)).toEqual({ excludeId: 1, startUnset: true, endUnset: true, ids: null });
    expect(buildConditions(opts({ guessEnd: false, filter: [3] }), 1)).toEqual({
      excludeId: 1, startUnset: true, endUnset: false, ids: [3],
    });
    expect(buildConditions(opts({ guessAll: true }), 9)).toEqual({ excludeId: 9, startUnset: false, endUnset: false, ids: null });
  });
});

describe("runGuessCourseDates", () => {
  beforeEach(() => {
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  test("dry-run prints every candidate in sortorder and writes nothing", async () => {
    const printed: string[] = [];
    const results = await runGuessCourseDates(opts({ guessAll: true }), deps(printed));
    expect(printed).toEqual([
      "c6 (id = 6): \n  Current start date is good: @1500000\n  The guessed end date (@1200000) is before the course start date.",
      "c5 (id = 5): \n  Course start date: @1000000\n  Course end date: @2000000",
      "w8 (id = 8): \n  Course start date: @3000000\n  End date automatically calculated from the course start date.",
    ]);
    expect(results.every((r) => !r.persisted)).toBe(true);
    const store = createFileCourseStore("t1", root);
    expect((await store.reload(5, cap)).startdate).toBe(0);
  });

  test("dry-run twice gives the same notifications", async () => {
    const first: string[] = [];
    const second: string[] = [];
    await runGuessCourseDates(opts(), deps(first));
    await runGuessCourseDates(opts(), deps(second));
    expect(second).toEqual(first);
  });

  test("update persists valid guesses and the weeks end date", async () => {
    const printed: string[] = [];
    const results = await runGuessCourseDates(opts({ update: true }), deps(printed));
    // c6 は開始日が設定済みなので対象外
    expect(results.map((r) => r.courseId)).toEqual([5, 8]);
    const store = createFileCourseStore("t1", root);
    expect(await store.reload(5, cap)).toMatchObject({ startdate: 1000000, enddate: 2000000 });
    const w8 = await store.reload(8, cap);
    expect(w8).toMatchObject({ startdate: 3000000, enddate: 3000000 + 7200 + 604800 });
    expect(printed[1]).toBe(
      "w8 (id = 8): \n  Course start date: @3000000\n" +
        `  End date automatically set based on start date and the number of sections: @${3000000 + 7200 + 604800}`
    );
  });

  test("filter restricts the course set", async () => {
    const printed: string[] = [];
    const results = await runGuessCourseDates(opts({ guessAll: true, filter: [6, 1] }), deps(printed));
    expect(results.map((r) => r.courseId)).toEqual([6]);
  });

  test("an invalid end guess is not written even with update", async () => {
    const printed: string[] = [];
    await runGuessCourseDates(opts({ guessAll: true, update: true, filter: [6] }), deps(printed));
    expect((await createFileCourseStore("t1", root).reload(6, cap)).enddate).toBe(0);
  });

  test("notifications go to print and the summary goes to stderr", async () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => undefined);
    const printed: string[] = [];
    await runGuessCourseDates(opts({ update: true }), deps(printed));
    expect(printed).toHaveLength(2);
    expect(printed.some((s) => s.includes("done."))).toBe(false);
    expect(log).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith("[guess] done. courses=2 persisted=2 mode=update");
  });

  test("a store rejection aborts the run and keeps earlier updates", async () => {
    await saveCourses("t1", [c(9, { sortorder: 4, enddate: 500000 }), c(10, { sortorder: 5 })], cap, root);
    fs.appendFileSync(
      path.join(root, "t1", "date_estimates.jsonl"),
      [{ id: 9, start: 1000000, end: 2000000 }, { id: 10, start: 1000000, end: 2000000 }]
        .map((e) => JSON.stringify(e)).join("\n") + "\n",
      "utf8"
    );
    const printed: string[] = [];
    await expect(
      runGuessCourseDates(opts({ guessAll: true, update: true, filter: [5, 9, 10] }), deps(printed))
    ).rejects.toThrow("enddatebeforestartdate");

    expect(printed).toEqual(["c5 (id = 5): \n  Course start date: @1000000\n  Course end date: @2000000"]);
    const store = createFileCourseStore("t1", root);
    expect(await store.reload(5, cap)).toMatchObject({ startdate: 1000000, enddate: 2000000 });
    expect(await store.reload(9, cap)).toMatchObject({ startdate: 0, enddate: 500000 });
    expect(await store.reload(10, cap)).toMatchObject({ startdate: 0, enddate: 0 });
  });
});
