import dayjs from "dayjs";
import { mergeById, readAll, tenantJsonlPath, upsertById } from "./jsonl";
import { requireCapability } from "../lib/auth";
import { hasAutomaticEndDate, weeksEndDate } from "../domain/weeks";
import type {
  Course,
  CourseConditions,
  CourseStore,
  FormatOptions,
  StoreCapability,
} from "../types/course";

const FILENAME = "courses.jsonl";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function tsOrNull(v: unknown): number | null {
  if (v === null || v === undefined || v === "") return null;
  const n = Number(v);
  return Number.isFinite(n) ? Math.floor(n) : null;
}

function formatOptionsFrom(v: unknown): FormatOptions {
  const out: FormatOptions = {};
  if (!isRecord(v)) return out;
  for (const [k, val] of Object.entries(v)) {
    if (typeof val === "string" || typeof val === "number" || typeof val === "boolean") out[k] = val;
  }
  return out;
}

/** JSONL の1行をコースとして解釈。id が無いものは捨てる */
export function parseCourse(raw: unknown): Course | null {
  if (!isRecord(raw)) return null;
  const id = Number(raw.id);
  if (!Number.isInteger(id) || id <= 0) return null;
  return {
    id,
    shortname: String(raw.shortname ?? ""),
    fullname: raw.fullname === undefined ? undefined : String(raw.fullname),
    sortorder: Number(raw.sortorder ?? 0) || 0,
    startdate: tsOrNull(raw.startdate),
    enddate: tsOrNull(raw.enddate),
    format: String(raw.format || "topics"),
    formatOptions: formatOptionsFrom(raw.formatOptions),
    timemodified: tsOrNull(raw.timemodified) ?? undefined,
  };
}

const isUnset = (ts: number | null) => !ts;

export function matchesConditions(course: Course, c: CourseConditions): boolean {
  if (course.id === c.excludeId) return false;
  if (c.startUnset && !isUnset(course.startdate)) return false;
  if (c.endUnset && !isUnset(course.enddate)) return false;
  if (c.ids && !c.ids.includes(course.id)) return false;
  return true;
}

/** LMS 側の update_course と同じ日付検証 */
export function validateCourseDates(course: Course): string | undefined {
  const start = course.startdate ?? 0;
  const end = course.enddate ?? 0;
  if (end > 0 && end < start) return "enddatebeforestartdate";
  return undefined;
}

/**
 * data/<tenant>/courses.jsonl を使うコースストア。
 * persist() は weeks 形式の自動終了日を再計算するため、呼び出し側は必要に応じて reload() すること。
 */
export function createFileCourseStore(tenant: string, root?: string): CourseStore {
  const file = tenantJsonlPath(tenant, FILENAME, root);

  const listAll = () => readAll<Course>(file, parseCourse);

  async function findOrThrow(courseId: number): Promise<Course> {
    const course = (await listAll()).find((c) => c.id === courseId);
    if (!course) throw new Error(`course not found: ${courseId}`);
    return course;
  }

  async function recompute(courseId: number): Promise<void> {
    const course = await findOrThrow(courseId);
    if (!hasAutomaticEndDate(course)) return;
    const end = weeksEndDate(course);
    if (end === null || end === course.enddate) return;
    await upsertById(file, { ...course, enddate: end, timemodified: dayjs().unix() }, parseCourse);
  }

  return {
    async fetch(conditions: CourseConditions, cap: StoreCapability) {
      requireCapability(cap, "course:view");
      const all = await listAll();
      return all
        .filter((c) => matchesConditions(c, conditions))
        .sort((a, b) => a.sortorder - b.sortorder || a.id - b.id);
    },

    async persist(course: Course, cap: StoreCapability) {
      requireCapability(cap, "course:update");
      const err = validateCourseDates(course);
      if (err) throw new Error(err);
      await findOrThrow(course.id);
      await upsertById(
        file,
        { ...course, formatOptions: { ...course.formatOptions }, timemodified: dayjs().unix() },
        parseCourse
      );
      // 開始日の変更で weeks の終了日が変わる
      await recompute(course.id);
    },

    async reload(courseId: number, cap: StoreCapability) {
      requireCapability(cap, "course:view");
      return findOrThrow(courseId);
    },

    async recomputeWeeksEndDate(courseId: number, cap: StoreCapability) {
      requireCapability(cap, "course:update");
      await recompute(courseId);
    },
  };
}

/** CSV 取込など、件数をまとめて書き込む用 */
export async function saveCourses(
  tenant: string,
  courses: Course[],
  cap: StoreCapability,
  root?: string
): Promise<void> {
  requireCapability(cap, "course:update");
  // 1件でも不正なら何も書かない
  for (const c of courses) {
    const err = validateCourseDates(c);
    if (err) throw new Error(`${err}: course ${c.id}`);
  }
  await mergeById(tenantJsonlPath(tenant, FILENAME, root), courses, parseCourse);
}
