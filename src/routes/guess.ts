// src/routes/guess.ts
import type { Request, Response } from "express";
import { DEFAULT_TENANT } from "../lib/env";
import { cleanSequence, hasWork } from "../lib/cli";
import { log } from "../lib/utils";
import { enqueueForTenant } from "../lib/tenantQueue";
import { runGuessCourseDates } from "../orchestrator/guessDates";
import type { DecisionDeps } from "../engine/dateDecision";
import type { GuessOptions } from "../types/course";

export type DepsFactory = (tenant: string) => DecisionDeps;

function boolField(v: unknown, def: boolean): boolean | undefined {
  if (v === undefined || v === null) return def;
  if (typeof v === "boolean") return v;
  if (typeof v === "number") return v !== 0;
  if (typeof v === "string") return !["", "0", "false", "no", "off"].includes(v.trim().toLowerCase());
  return undefined;
}

function filterField(v: unknown): number[] | null | undefined {
  if (v === undefined || v === null) return null;
  if (typeof v === "string") return cleanSequence(v);
  if (Array.isArray(v) && v.every((x) => Number.isInteger(x))) return v.map(Number);
  return undefined;
}

/** リクエストボディ → GuessOptions。型が合わない項目があればエラー文字列 */
export function optionsFromBody(body: unknown): { options: GuessOptions; tenant: string } | { error: string } {
  const b: Record<string, unknown> = {};
  if (typeof body === "object" && body !== null) Object.assign(b, body);

  const guessStart = boolField(b.guessstart, true);
  const guessEnd = boolField(b.guessend, true);
  const guessAll = boolField(b.guessall, false);
  const update = boolField(b.update, false);
  const filter = filterField(b.filter);
  if (guessStart === undefined) return { error: "invalid guessstart" };
  if (guessEnd === undefined) return { error: "invalid guessend" };
  if (guessAll === undefined) return { error: "invalid guessall" };
  if (update === undefined) return { error: "invalid update" };
  if (filter === undefined) return { error: "invalid filter" };
  if (b.tenant !== undefined && typeof b.tenant !== "string") return { error: "invalid tenant" };

  const tenant = (typeof b.tenant === "string" && b.tenant.trim()) || DEFAULT_TENANT;
  return { options: { guessStart, guessEnd, guessAll, update, filter }, tenant };
}

export function guessCourseDatesHandler(depsFor: DepsFactory) {
  return async (req: Request, res: Response) => {
    const parsed = optionsFromBody(req.body);
    if ("error" in parsed) {
      res.status(400).json({ ok: false, error: parsed.error });
      return;
    }
    const { options, tenant } = parsed;
    if (!hasWork(options)) {
      res.json({ ok: true, results: [] });
      return;
    }
    try {
      // 同じテナントのバッチは直列に（courses.jsonl の読み書きが重ならないように）
      const results = await enqueueForTenant(tenant, () =>
        runGuessCourseDates(options, { ...depsFor(tenant), print: (s) => log("web", s) })
      );
      res.json({
        ok: true,
        results: results.map((r) => ({
          courseId: r.courseId,
          shortname: r.shortname,
          notification: r.notification,
          persisted: r.persisted,
        })),
      });
    } catch (e) {
      console.error("[web] guess-course-dates failed:", e);
      res.status(500).json({ ok: false, error: e instanceof Error ? e.message : String(e) });
    }
  };
}
