/**
 * Operator endpoints. Every route needs the admin token, given either as the
 * `x-admin-token` header or the `token` query parameter. With no token
 * configured the routes answer 403.
 *
 * /funnel/reset wipes funnel metrics and additionally needs `confirm=RESET`.
 */

import { timingSafeEqual } from "crypto";
import { Router, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import { createLogger, errorMessage, recentLogLines } from "../infra/logger";
import type { Runtime } from "../runtime";
import { isSubjectId } from "../services/subjects";
import { describeError } from "../types/result";

const log = createLogger("admin");

export interface OpsSnapshot {
  queueDepth: number;
  processingDepth: number;
  pendingPayments: number;
  followupsDue: number;
  retryDepth: number;
  funnel: Record<string, string>;
  funnelToday: Record<string, string>;
}

export async function opsSnapshot(rt: Runtime): Promise<OpsSnapshot> {
  return {
    queueDepth: await rt.queue.depth(),
    processingDepth: await rt.queue.reserved(),
    pendingPayments: await rt.ledger.pendingCount(),
    followupsDue: await rt.scheduler.size(),
    retryDepth: await rt.retry.depth(),
    funnel: await rt.funnel.counters(),
    funnelToday: await rt.funnel.today()
  };
}

function tokenOf(req: Request): string {
  const header = req.get("x-admin-token");
  if (header) return header;
  return typeof req.query.token === "string" ? req.query.token : "";
}

export function requireAdmin(adminToken: string) {
  const expected = Buffer.from(adminToken, "utf8");
  return (req: Request, res: Response, next: NextFunction): void => {
    const given = Buffer.from(tokenOf(req), "utf8");
    if (adminToken === "" || given.length !== expected.length || !timingSafeEqual(given, expected)) {
      res.status(403).json({ ok: false, error: "forbidden" });
      return;
    }
    next();
  };
}

export function adminRouter(rt: Runtime): Router {
  const router = Router();
  router.use(requireAdmin(rt.config.adminToken));

  router.get("/ops", async (_req, res) => {
    try {
      res.json({ ok: true, ops: await opsSnapshot(rt) });
    } catch (err) {
      log.error("ops snapshot failed", { error: errorMessage(err) });
      res.status(503).json({ ok: false, error: "store unavailable" });
    }
  });

  router.get("/logs", (req, res) => {
    const limit = Number(req.query.limit ?? "200");
    res.json({ ok: true, lines: recentLogLines(Number.isFinite(limit) && limit > 0 ? limit : 200) });
  });

  router.post("/subjects/:id/deliver", async (req, res) => {
    const subjectId = req.params.id;
    if (!isSubjectId(subjectId)) {
      res.status(400).json({ ok: false, error: "invalid subject id" });
      return;
    }
    try {
      const result = await rt.delivery.deliverIfNeeded(subjectId, { forceResend: true });
      if (!result.ok) {
        res.status(502).json({ ok: false, error: describeError(result.error) });
        return;
      }
      log.info("manual delivery", { subjectId });
      res.json({ ok: true, sentNow: result.value.sentNow });
    } catch (err) {
      log.error("manual delivery failed", { subjectId, error: errorMessage(err) });
      res.status(503).json({ ok: false, error: "store unavailable" });
    }
  });

  const resetFunnel: RequestHandler = async (req, res) => {
    const confirm = typeof req.query.confirm === "string" ? req.query.confirm : "";
    if (confirm.toUpperCase() !== "RESET") {
      res.status(400).json({ ok: false, error: "confirm_required", hint: "Use confirm=RESET" });
      return;
    }
    try {
      const deletedDayKeys = await rt.funnel.reset();
      res.json({ ok: true, deletedDayKeys });
    } catch (err) {
      log.error("funnel reset failed", { error: errorMessage(err) });
      res.status(503).json({ ok: false, error: "store unavailable" });
    }
  };
  router.post("/funnel/reset", resetFunnel);
  router.get("/funnel/reset", resetFunnel);

  return router;
}
