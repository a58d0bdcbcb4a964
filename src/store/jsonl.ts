import path from "path";
import { promises as fs } from "fs";
import { DATA_DIR } from "../lib/env";
import { safeTenant } from "../lib/utils";

async function ensureDirFor(filePath: string) {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
}

function isMissing(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

async function readLines(filePath: string): Promise<string[]> {
  try {
    const txt = await fs.readFile(filePath, "utf8");
    return txt
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  } catch (err) {
    if (isMissing(err)) return [];
    throw err;
  }
}

async function writeLines(filePath: string, lines: string[]): Promise<void> {
  await ensureDirFor(filePath);
  if (!lines.length) {
    await fs.writeFile(filePath, "", "utf8");
    return;
  }
  await fs.writeFile(filePath, lines.join("\n") + "\n", "utf8");
}

export function tenantJsonlPath(tenant: string, filename: string, root: string = DATA_DIR): string {
  return path.resolve(root, safeTenant(tenant), filename);
}

/** 1行1レコード。parse が null を返した行・壊れた行は読み飛ばす */
export async function readAll<T>(filePath: string, parse: (raw: unknown) => T | null): Promise<T[]> {
  const entries = await readEntries(filePath, parse);
  const items: T[] = [];
  for (const e of entries) if (e.item) items.push(e.item);
  return items;
}

type Entry<T> = { line: string; item: T | null };

async function readEntries<T>(filePath: string, parse: (raw: unknown) => T | null): Promise<Entry<T>[]> {
  const lines = await readLines(filePath);
  return lines.map((line) => {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      return { line, item: null }; // malformed
    }
    return { line, item: parse(raw) };
  });
}

/**
 * id で上書き・追加して1回で書き戻す。解釈できなかった行はそのまま残す。
 */
export async function mergeById<T extends { id: number }>(
  filePath: string,
  objs: T[],
  parse: (raw: unknown) => T | null
): Promise<void> {
  const pending = new Map(objs.map((o): [number, T] => [o.id, o]));
  const lines: string[] = [];
  for (const e of await readEntries(filePath, parse)) {
    const next = e.item ? pending.get(e.item.id) : undefined;
    if (e.item && next) {
      lines.push(JSON.stringify(next));
      pending.delete(e.item.id);
    } else {
      lines.push(e.line);
    }
  }
  for (const o of pending.values()) lines.push(JSON.stringify(o));
  await writeLines(filePath, lines);
}

export async function upsertById<T extends { id: number }>(
  filePath: string,
  obj: T,
  parse: (raw: unknown) => T | null
): Promise<T> {
  await mergeById(filePath, [obj], parse);
  return obj;
}
