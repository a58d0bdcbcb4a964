import { parse } from "csv-parse/sync";
import { toTimestamp } from "../lib/utils";
import type { Course, FormatOptions } from "../types/course";

/*
 * コース一覧CSV → Course[]
 * 列: id, shortname, fullname, sortorder, startdate, enddate, format, automaticenddate, numsections
 * 日付は unix 秒か YYYY-MM-DD。空欄は未設定。
 */

export type CsvRowError = { line: number; error: string };

function cell(row: Record<string, string>, key: string): string {
  return String(row[key] ?? row[key.toUpperCase()] ?? "").trim();
}

function toRows(raw: unknown): Record<string, string>[] {
  if (!Array.isArray(raw)) return [];
  return raw.map((r: unknown) => {
    const row: Record<string, string> = {};
    if (typeof r === "object" && r !== null) {
      for (const [k, v] of Object.entries(r)) row[k] = String(v ?? "");
    }
    return row;
  });
}

export function parseCoursesCsv(content: string, tz?: string): { courses: Course[]; errors: CsvRowError[] } {
  const rows = toRows(parse(content, { columns: true, skip_empty_lines: true, trim: true, bom: true }));
  const courses: Course[] = [];
  const errors: CsvRowError[] = [];

  rows.forEach((row, i) => {
    const line = i + 2; // ヘッダ行の次から
    const id = Number(cell(row, "id"));
    if (!Number.isInteger(id) || id <= 0) { errors.push({ line, error: "invalid id" }); return; }

    const rawStart = cell(row, "startdate");
    const rawEnd = cell(row, "enddate");
    const startdate = toTimestamp(rawStart, tz);
    const enddate = toTimestamp(rawEnd, tz);
    if (rawStart && startdate === null) { errors.push({ line, error: `invalid startdate: ${rawStart}` }); return; }
    if (rawEnd && enddate === null) { errors.push({ line, error: `invalid enddate: ${rawEnd}` }); return; }

    const format = cell(row, "format") || "topics";
    const formatOptions: FormatOptions = {};
    const auto = cell(row, "automaticenddate");
    if (auto) formatOptions.automaticenddate = ["1", "true", "yes"].includes(auto.toLowerCase());
    const numsections = cell(row, "numsections");
    if (numsections) formatOptions.numsections = Number(numsections) || 0;

    courses.push({
      id,
      shortname: cell(row, "shortname") || `course-${id}`,
      fullname: cell(row, "fullname") || undefined,
      sortorder: Number(cell(row, "sortorder")) || 0,
      startdate,
      enddate,
      format,
      formatOptions,
    });
  });

  return { courses, errors };
}
