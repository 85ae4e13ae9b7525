// src/middleware/requestLogger.ts
import type { NextFunction, Request, Response } from "express";
import { env } from "../config/env";

/** One line per finished request: "GET /api/v1/competitions 200 12ms". */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
    if (!env.logRequests) return next();
    const started = process.hrtime.bigint();
    res.on("finish", () => {
        const ms = Number(process.hrtime.bigint() - started) / 1e6;
        console.log(`${req.method} ${req.originalUrl} ${res.statusCode} ${ms.toFixed(0)}ms`);
    });
    next();
}
