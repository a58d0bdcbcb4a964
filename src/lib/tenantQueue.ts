// src/lib/tenantQueue.ts
import { safeTenant } from "./utils";

/* ====== テナント単位の直列キュー ====== */
const queues = new Map<string, Promise<unknown>>();

/** 同じテナントの処理を到着順に1つずつ実行する。前の処理の失敗は後続に影響しない */
export function enqueueForTenant<T>(tenant: string, fn: () => Promise<T>): Promise<T> {
  const key = safeTenant(tenant);
  const prev = queues.get(key) ?? Promise.resolve();
  const next = prev.then(fn, fn);
  const tail = next.then(
    () => undefined,
    () => undefined
  );
  queues.set(key, tail);
  // 最後の待ち手なら片付ける
  void tail.then(() => {
    if (queues.get(key) === tail) queues.delete(key);
  });
  return next;
}
