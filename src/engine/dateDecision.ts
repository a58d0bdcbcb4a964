import { getString, userdate } from "../lib/utils";
import { hasAutomaticEndDate } from "../domain/weeks";
import type {
  Course,
  CourseStore,
  DateEstimator,
  DecisionOutcome,
  DecisionResult,
  GuessOptions,
  StoreCapability,
  Timestamp,
} from "../types/course";

export type DecisionDeps = {
  estimator: DateEstimator;
  store: CourseStore;
  cap: StoreCapability;
  formatDate?: (ts: Timestamp) => string;
};

type StepResult = { course: Course; outcome: DecisionOutcome; persisted: boolean };

// 未設定は null と 0 のどちらでも来る
const sameDate = (a: Timestamp | null, b: Timestamp | null) => (a || 0) === (b || 0);

/**
 * 開始日の推定。新しい推定値はメモリ上のコースに反映し、update 時は保存して読み直す。
 * 保存で終了日などの派生値が変わりうるため、以降の判定は読み直したコースで行う。
 */
export async function decideStartDate(course: Course, update: boolean, deps: DecisionDeps): Promise<StepResult> {
  const original = course.startdate;
  const guessed = await deps.estimator.guessStart(course);

  if (sameDate(guessed, original)) {
    if (!guessed) return { course, outcome: { kind: "cant-guess", field: "start" }, persisted: false };
    return { course, outcome: { kind: "unchanged", field: "start", value: guessed }, persisted: false };
  }
  if (!guessed) return { course, outcome: { kind: "cant-guess", field: "start" }, persisted: false };

  // 保存しない場合も終了日の判定に使う
  course.startdate = guessed;
  const outcome: DecisionOutcome = { kind: "guessed", field: "start", value: guessed };
  if (!update) return { course, outcome, persisted: false };

  await deps.store.persist(course, deps.cap);
  const fresh = await deps.store.reload(course.id, deps.cap);
  return { course: fresh, outcome, persisted: true };
}

/**
 * 終了日の推定。weeks 形式で自動終了日が有効なら推定は使わず、形式側の計算に任せる。
 * 推定値が開始日以前なら保存しない（update 指定時も同じ）。
 */
export async function decideEndDate(course: Course, update: boolean, deps: DecisionDeps): Promise<StepResult> {
  const original = course.enddate;

  if (hasAutomaticEndDate(course)) {
    if (!update) {
      // 実際に保存しないと値は出せない
      return { course, outcome: { kind: "weeks-default" }, persisted: false };
    }
    await deps.store.recomputeWeeksEndDate(course.id, deps.cap);
    const fresh = await deps.store.reload(course.id, deps.cap);
    course.enddate = fresh.enddate;
    return { course, outcome: { kind: "weeks-auto-set", value: fresh.enddate }, persisted: true };
  }

  const guessed = await deps.estimator.guessEnd(course);

  if (sameDate(guessed, original)) {
    if (!guessed) return { course, outcome: { kind: "cant-guess", field: "end" }, persisted: false };
    return { course, outcome: { kind: "unchanged", field: "end", value: guessed }, persisted: false };
  }
  if (!guessed) return { course, outcome: { kind: "cant-guess", field: "end" }, persisted: false };

  course.enddate = guessed;
  if (guessed <= (course.startdate || 0)) {
    return { course, outcome: { kind: "end-before-start", value: guessed }, persisted: false };
  }
  if (update) await deps.store.persist(course, deps.cap);
  return { course, outcome: { kind: "guessed", field: "end", value: guessed }, persisted: update };
}

export function describeOutcome(o: DecisionOutcome, formatDate: (ts: Timestamp) => string = (ts) => userdate(ts)): string {
  switch (o.kind) {
    case "cant-guess":
      return getString(o.field === "start" ? "cantguessstartdate" : "cantguessenddate");
    case "unchanged":
      return `${getString(o.field === "start" ? "samestartdate" : "sameenddate")}: ${formatDate(o.value)}`;
    case "guessed":
      return `${getString(o.field === "start" ? "startdate" : "enddate")}: ${formatDate(o.value)}`;
    case "weeks-auto-set":
      return o.value
        ? `${getString("weeksenddateautomaticallyset")}: ${formatDate(o.value)}`
        : getString("weeksenddateautomaticallyset");
    case "weeks-default":
      return getString("weeksenddatedefault");
    case "end-before-start":
      return getString("errorendbeforestart", formatDate(o.value));
  }
}

/** 1コース分の開始日・終了日の判定と通知文の組み立て */
export async function calculateCourseDates(
  input: Course,
  options: GuessOptions,
  deps: DecisionDeps
): Promise<DecisionResult> {
  let course = input;
  const outcomes: DecisionOutcome[] = [];
  let persisted = false;

  if (options.guessStart || options.guessAll) {
    const r = await decideStartDate(course, options.update, deps);
    course = r.course;
    outcomes.push(r.outcome);
    persisted = persisted || r.persisted;
  }

  if (options.guessEnd || options.guessAll) {
    const r = await decideEndDate(course, options.update, deps);
    course = r.course;
    outcomes.push(r.outcome);
    persisted = persisted || r.persisted;
  }

  const header = `${input.shortname} (id = ${input.id}): `;
  const notification = header + outcomes.map((o) => `\n  ${describeOutcome(o, deps.formatDate)}`).join("");

  return { courseId: input.id, shortname: input.shortname, notification, persisted, outcomes, course };
}
