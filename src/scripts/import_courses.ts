import "dotenv/config";
import fs from "fs";
import { CSV_ENCODING, DEFAULT_TENANT } from "../lib/env";
import { adminCapability } from "../lib/auth";
import { parseCoursesCsv } from "../features/courseCsv";
import { saveCourses } from "../store/courses";

function normalizeEncoding(enc?: string): BufferEncoding {
  const v = String(enc || "utf8").toLowerCase();
  if (v === "utf-8" || v === "utf8") return "utf8";
  if (v === "latin1" || v === "ascii" || v === "utf16le") return v;
  throw new Error(`unsupported CSV_ENCODING: ${enc}`);
}

/** CSV を読み込んで data/<tenant>/courses.jsonl に upsert。行エラーがあれば 1 を返す */
export async function importCourses(filePath: string, tenant: string = DEFAULT_TENANT, root?: string): Promise<number> {
  const content = fs.readFileSync(filePath, { encoding: normalizeEncoding(CSV_ENCODING) });
  const { courses, errors } = parseCoursesCsv(content);
  for (const e of errors) console.warn(`[import] line ${e.line}: ${e.error}`);

  await saveCourses(tenant, courses, adminCapability("csv-import"), root);
  console.log(`[import] ${filePath} -> tenant=${tenant} courses=${courses.length} errors=${errors.length}`);
  return errors.length ? 1 : 0;
}

if (require.main === module) {
  const file = process.argv[2];
  const idx = process.argv.indexOf("--tenant");
  const tenant = idx >= 0 ? process.argv[idx + 1] : undefined;
  if (!file) {
    console.log("Usage: ts-node src/scripts/import_courses.ts courses.csv [--tenant default]");
    process.exit(1);
  }
  importCourses(file, tenant)
    .then((code) => { process.exitCode = code; })
    .catch((err) => { console.error(err); process.exit(1); });
}
