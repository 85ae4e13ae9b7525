// src/middleware/errorHandler.ts
import type { NextFunction, Request, Response } from "express";
import { HttpError } from "../utils/errors";

type Res = Pick<Response, "status" | "json" | "headersSent">;

/**
 * HttpError → its own status and message (5xx are still logged).
 * Anything else (driver errors included) → 500 with a generic body.
 */
export function errorHandler(err: unknown, req: Pick<Request, "method" | "originalUrl">, res: Res, next: NextFunction) {
    if (res.headersSent) return next(err);

    if (err instanceof HttpError) {
        if (err.status >= 500) console.error(`${req.method} ${req.originalUrl} failed:`, err);
        res.status(err.status).json({ error: err.message });
        return;
    }

    console.error(`${req.method} ${req.originalUrl} failed:`, err);
    res.status(500).json({ error: "Internal Server Error" });
}
