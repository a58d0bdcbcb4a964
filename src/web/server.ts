// src/web/server.ts
import "dotenv/config";
import express from "express";
import { ADMIN_TOKEN, PORT } from "../lib/env";
import { log } from "../lib/utils";
import { requireAdminToken } from "../lib/auth";
import { defaultDeps } from "../orchestrator/guessDates";
import { guessCourseDatesHandler, type DepsFactory } from "../routes/guess";

export type AppOptions = {
  adminToken?: string;
  depsFor?: DepsFactory;
};

export function createApp(opts: AppOptions = {}) {
  const app = express();
  app.set("x-powered-by", false);
  app.use(express.json());

  const depsFor: DepsFactory = opts.depsFor ?? ((tenant) => defaultDeps(tenant, "web-admin"));

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.post(
    "/api/guess-course-dates",
    requireAdminToken(opts.adminToken ?? ADMIN_TOKEN),
    guessCourseDatesHandler(depsFor)
  );

  return app;
}

if (require.main === module) {
  createApp().listen(PORT, () => log("web", `listening on :${PORT}`));
}
