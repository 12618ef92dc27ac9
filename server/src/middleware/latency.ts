import type { NextFunction, Request, Response } from "express"
import { performance } from "node:perf_hooks"

export function latencyLogger(req: Request, res: Response, next: NextFunction) {
  const startedAt = performance.now()
  res.on("finish", () => {
    const durationMs = performance.now() - startedAt
    console.info(`[http] ${req.method} ${req.path} ${res.statusCode} ${durationMs.toFixed(1)}ms`)
  })
  next()
}
