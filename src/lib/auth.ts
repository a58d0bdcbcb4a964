import crypto from "crypto";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { Capability, StoreCapability } from "../types/course";

/* ====== ストア操作の権限トークン ====== */
export function adminCapability(actor = "cli-admin"): StoreCapability {
  return { actor, can: new Set<Capability>(["course:view", "course:update"]) };
}

export function readOnlyCapability(actor = "viewer"): StoreCapability {
  return { actor, can: new Set<Capability>(["course:view"]) };
}

export function requireCapability(cap: StoreCapability, need: Capability): void {
  if (!cap.can.has(need)) throw new Error(`capability required: ${need}`);
}

/* ====== 管理API の Bearer 認証 ====== */
export function timingEqual(a: string, b: string) {
  const A = Buffer.from(a), B = Buffer.from(b);
  return A.length === B.length && crypto.timingSafeEqual(A, B);
}

export function getTokenFromHeaders(req: Request): string {
  const raw = req.get("authorization") || req.get("x-authorization") || "";
  return raw.replace(/^Bearer\s+/i, "").trim();
}

export function requireAdminToken(expected: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expected) {
      res.status(500).json({ ok: false, error: "missing ADMIN_TOKEN" });
      return;
    }
    if (!timingEqual(getTokenFromHeaders(req), expected)) {
      res.status(401).json({ ok: false, error: "auth" });
      return;
    }
    next();
  };
}
