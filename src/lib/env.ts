import "dotenv/config";
import fs from "fs";

export function readEnvJsonOrFile(jsonVar: string, fileVar: string): string {
  const j = process.env[jsonVar];
  if (j && j.trim()) return j.trim();
  const fp = process.env[fileVar];
  if (fp && fp.trim()) return fs.readFileSync(fp.trim(), "utf8");
  return "";
}

function num(v: string | undefined, def: number): number {
  const n = Number(v);
  return v !== undefined && v !== "" && Number.isFinite(n) ? n : def;
}

/* ====== データ保存先 ====== */
export const DATA_DIR = String(process.env.DATA_DIR || "./data");
export const DEFAULT_TENANT = String(process.env.DEFAULT_TENANT || "default").trim() || "default";

/* サイトコース（一覧から常に除外） */
export const SITE_COURSE_ID = num(process.env.SITE_COURSE_ID, 1);

/* 日付表示 */
export const APP_TZ = String(process.env.APP_TZ || "UTC");
export const DATE_FORMAT = String(process.env.DATE_FORMAT || "dddd, D MMMM YYYY, h:mm A");

/* 推定サービス */
export const ANALYTICS_BASE_URL = String(process.env.ANALYTICS_BASE_URL || "").replace(/\/+$/, "");
export const ANALYTICS_TOKEN = readEnvJsonOrFile("ANALYTICS_TOKEN", "ANALYTICS_TOKEN_FILE");
export const ANALYTICS_TIMEOUT_MS = num(process.env.ANALYTICS_TIMEOUT_MS, 10000);

/* 管理API */
export const PORT = num(process.env.PORT, 10000);
export const ADMIN_TOKEN = readEnvJsonOrFile("ADMIN_TOKEN", "ADMIN_TOKEN_FILE");

/* CSV取込 */
export const CSV_ENCODING = String(process.env.CSV_ENCODING || "utf-8");
