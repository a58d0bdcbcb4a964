import { readAll, tenantJsonlPath } from "./jsonl";
import type { Course, DateEstimator, Timestamp } from "../types/course";

/**
 * 分析基盤が書き出した推定値（data/<tenant>/date_estimates.jsonl）を読む推定器。
 * 1行 = { "id": コースID, "start": unix秒|null, "end": unix秒|null }
 */
export interface EstimateRecord {
  id: number;
  start: Timestamp | null;
  end: Timestamp | null;
}

const FILENAME = "date_estimates.jsonl";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function tsOrNull(v: unknown): Timestamp | null {
  if (typeof v !== "number" || !Number.isFinite(v) || v <= 0) return null;
  return Math.floor(v);
}

export function parseEstimate(raw: unknown): EstimateRecord | null {
  if (!isRecord(raw)) return null;
  const id = Number(raw.id);
  if (!Number.isInteger(id) || id <= 0) return null;
  return { id, start: tsOrNull(raw.start), end: tsOrNull(raw.end) };
}

export function createFileEstimator(tenant: string, root?: string): DateEstimator {
  const file = tenantJsonlPath(tenant, FILENAME, root);
  let cache: Map<number, EstimateRecord> | undefined;

  async function lookup(courseId: number): Promise<EstimateRecord | undefined> {
    if (!cache) {
      // 同じ id が複数あれば後勝ち
      cache = new Map((await readAll(file, parseEstimate)).map((e): [number, EstimateRecord] => [e.id, e]));
    }
    return cache.get(courseId);
  }

  return {
    async guessStart(course: Course) {
      return (await lookup(course.id))?.start ?? null;
    },
    async guessEnd(course: Course) {
      return (await lookup(course.id))?.end ?? null;
    },
  };
}
