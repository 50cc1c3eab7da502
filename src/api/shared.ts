import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'node:crypto';
import type { ApiEnvelope } from '../types/api.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

// ── Response Helpers ────────────────────────────────────────────────────────

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const correlationId = res.locals.correlationId as string | undefined;
    const body: ApiEnvelope<T> = {
        ok: true,
        data,
        correlationId,
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError(res: Response, message: string, status = 400): void {
    const correlationId = res.locals.correlationId as string | undefined;
    const body: ApiEnvelope = {
        ok: false,
        error: scrubSensitiveText(message),
        correlationId,
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    void logThought(`[API] [${correlationId}] ${req.method} ${req.path}`);
    next();
}
