import { ANALYTICS_BASE_URL, SITE_COURSE_ID } from "../lib/env";
import { adminCapability } from "../lib/auth";
import { calculateCourseDates, type DecisionDeps } from "../engine/dateDecision";
import { createAnalyticsEstimator } from "../connectors/analytics";
import { createFileEstimator } from "../store/estimates";
import { createFileCourseStore } from "../store/courses";
import type { CourseConditions, DecisionResult, GuessOptions } from "../types/course";

export type BatchDeps = DecisionDeps & {
  siteCourseId?: number;
  /** コースごとの通知の出力先（既定は標準出力） */
  print?: (notification: string) => void;
};

/** 推定APIが設定されていればそちら、無ければ推定値ファイルを使う */
export function defaultDeps(tenant: string, actor = "cli-admin"): DecisionDeps {
  return {
    estimator: ANALYTICS_BASE_URL ? createAnalyticsEstimator() : createFileEstimator(tenant),
    store: createFileCourseStore(tenant),
    cap: adminCapability(actor),
  };
}

export function buildConditions(options: GuessOptions, siteCourseId: number = SITE_COURSE_ID): CourseConditions {
  return {
    excludeId: siteCourseId,
    // guessall なら設定済みのコースも対象
    startUnset: !options.guessAll && options.guessStart,
    endUnset: !options.guessAll && options.guessEnd,
    ids: options.filter,
  };
}

/**
 * 対象コースを sortorder 順に1件ずつ処理する。
 * 途中で例外が出たらそこで中断（それまでの保存は取り消さない）。
 */
export async function runGuessCourseDates(options: GuessOptions, deps: BatchDeps): Promise<DecisionResult[]> {
  const print = deps.print ?? ((s: string) => console.log(s));
  const courses = await deps.store.fetch(buildConditions(options, deps.siteCourseId), deps.cap);

  const results: DecisionResult[] = [];
  for (const course of courses) {
    const r = await calculateCourseDates(course, options, deps);
    print(r.notification);
    results.push(r);
  }

  const persisted = results.filter((r) => r.persisted).length;
  // 通知（stdout）と混ざらないよう集計は stderr へ
  console.error(`[guess] done. courses=${results.length} persisted=${persisted} mode=${options.update ? "update" : "dry-run"}`);
  return results;
}
