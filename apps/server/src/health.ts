import type { Request, Response } from "express";

const startedAt = Date.now();

export function liveness(_req: Request, res: Response) {
  res.status(200).json({ ok: true, status: "live" });
}

export function healthz(_req: Request, res: Response) {
  res.status(200).json({
    ok: true,
    startedAt: new Date(startedAt).toISOString(),
    uptimeSec: Math.round(process.uptime()),
    timestamp: Date.now(),
  });
}
