// src/domain/weeks.ts
import type { Course, Timestamp } from "../types/course";

export const WEEKS_FORMAT = "weeks";
export const WEEK_SECONDS = 7 * 24 * 60 * 60;
// 夏時間の切り替えで日付が前日にずれないよう 2 時間足す
const DST_PAD_SECONDS = 2 * 60 * 60;

/** weeks 形式かつ automaticenddate が有効なコースか */
export function hasAutomaticEndDate(course: Course): boolean {
  return course.format === WEEKS_FORMAT && Boolean(course.formatOptions.automaticenddate);
}

/** n 週目（1始まり）の開始・終了 */
export function weekSectionDates(sectionnum: number, startdate: Timestamp): { start: Timestamp; end: Timestamp } {
  const start = startdate + DST_PAD_SECONDS + WEEK_SECONDS * (sectionnum - 1);
  return { start, end: start + WEEK_SECONDS };
}

/**
 * 最終週の終わりを終了日とする。開始日が未設定なら算出できない（null）。
 */
export function weeksEndDate(course: Course): Timestamp | null {
  if (!course.startdate) return null;
  const n = Math.max(0, Math.floor(Number(course.formatOptions.numsections ?? 0)));
  return weekSectionDates(n, course.startdate).end;
}
