// src/lib/utils.ts
import fs from "fs";
import path from "path";
import yaml from "js-yaml";
import dayjs from "dayjs";
import utc from "dayjs/plugin/utc";
import timezone from "dayjs/plugin/timezone";
import { APP_TZ, DATE_FORMAT } from "./env";

dayjs.extend(utc);
dayjs.extend(timezone);

export function log(tag: string, ...a: unknown[]) { console.log(`[${tag}]`, ...a); }

export function safeTenant(input: string | undefined) {
  return String(input || "default").trim().replace(/[^a-zA-Z0-9_.@\-]/g, "_") || "default";
}

/** unix 秒を表示用に整形 */
export function userdate(ts: number, tz: string = APP_TZ, format: string = DATE_FORMAT): string {
  return dayjs.unix(ts).tz(tz).format(format);
}

/** "2024-09-02" / "1725235200" のどちらも unix 秒へ。解釈できなければ null */
export function toTimestamp(v: unknown, tz: string = APP_TZ): number | null {
  const s = String(v ?? "").trim();
  if (!s) return null;
  if (/^\d+$/.test(s)) return Number(s);
  if (!/^\d{4}-\d{2}-\d{2}/.test(s)) return null;
  const d = dayjs.tz(s, tz);
  return d.isValid() ? d.unix() : null;
}

/* ====== 通知文言 ====== */
export type StringKey =
  | "startdate"
  | "enddate"
  | "cantguessstartdate"
  | "cantguessenddate"
  | "samestartdate"
  | "sameenddate"
  | "weeksenddateautomaticallyset"
  | "weeksenddatedefault"
  | "errorendbeforestart";

let strings: Record<string, string> | undefined;

/** src/lib からでも dist/src/lib からでも config/strings.yml を探す（カレントディレクトリに依存しない） */
export function resolveStringsPath(baseDir: string = __dirname): string {
  const candidates = [
    path.resolve(baseDir, "../../config/strings.yml"),
    path.resolve(baseDir, "../../../config/strings.yml"),
  ];
  const found = candidates.find((p) => fs.existsSync(p));
  if (!found) throw new Error(`strings.yml not found: ${candidates.join(", ")}`);
  return found;
}

function loadStrings(): Record<string, string> {
  if (strings) return strings;
  const raw = yaml.load(fs.readFileSync(resolveStringsPath(), "utf8"));
  const out: Record<string, string> = {};
  if (raw && typeof raw === "object") {
    for (const [k, v] of Object.entries(raw)) {
      if (typeof v === "string") out[k] = v;
    }
  }
  strings = out;
  return out;
}

export function getString(key: StringKey, date?: string): string {
  const s = loadStrings()[key];
  if (s === undefined) throw new Error(`missing string: ${key}`);
  return date === undefined ? s : s.replace(/\{date\}/g, date);
}
