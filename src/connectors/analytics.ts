// src/connectors/analytics.ts
// 分析基盤の推定API：GET {base}/courses/{id}/estimates/{start|end} → { timestamp: number|null }
import axios, { type AxiosRequestConfig } from "axios";
import { ANALYTICS_BASE_URL, ANALYTICS_TIMEOUT_MS, ANALYTICS_TOKEN } from "../lib/env";
import type { Course, DateEstimator, DateField, Timestamp } from "../types/course";

export type HttpGet = (url: string, config?: AxiosRequestConfig) => Promise<{ status: number; data: unknown }>;

export type AnalyticsOptions = {
  baseUrl?: string;
  token?: string;
  timeoutMs?: number;
  get?: HttpGet;
};

/** レスポンスから timestamp を取り出す。0・負数・非数は「推定なし」 */
export function readTimestamp(data: unknown): Timestamp | null {
  if (typeof data !== "object" || data === null || !("timestamp" in data)) return null;
  const v = data.timestamp;
  if (typeof v !== "number" || !Number.isFinite(v) || v <= 0) return null;
  return Math.floor(v);
}

export function createAnalyticsEstimator(opts: AnalyticsOptions = {}): DateEstimator {
  const baseUrl = (opts.baseUrl ?? ANALYTICS_BASE_URL).replace(/\/+$/, "");
  const token = opts.token ?? ANALYTICS_TOKEN;
  const timeout = opts.timeoutMs ?? ANALYTICS_TIMEOUT_MS;
  const get: HttpGet = opts.get ?? axios.get;
  if (!baseUrl) throw new Error("ANALYTICS_BASE_URL missing");

  async function estimate(course: Course, field: DateField): Promise<Timestamp | null> {
    const url = `${baseUrl}/courses/${encodeURIComponent(String(course.id))}/estimates/${field}`;
    const res = await get(url, {
      headers: token ? { Authorization: `Bearer ${token}` } : {},
      timeout,
      validateStatus: () => true,
    });
    if (res.status === 404) return null; // 推定なし
    if (res.status < 200 || res.status >= 300) {
      throw new Error(`analytics ${res.status}: ${JSON.stringify(res.data)}`);
    }
    return readTimestamp(res.data);
  }

  return {
    guessStart: (course) => estimate(course, "start"),
    guessEnd: (course) => estimate(course, "end"),
  };
}
