import { createServer, type Server } from 'node:http';
import express, { type Express } from 'express';
import { handleHealth, handleLiveness, type HealthDeps } from './handlers/health.js';
import { requestLogger, sendError } from './shared.js';
import { logConsole } from '../utils/logger.js';

export type ApiServerDeps = HealthDeps;

/**
 * Build the health API.
 *
 * Endpoints:
 *   GET /health/live   Liveness, no checks run
 *   GET /health        Full smoke suite; 200 when healthy, 503 otherwise
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();

    app.use(express.json());
    app.use(requestLogger);

    app.get('/health/live', handleLiveness());
    app.get('/health', handleHealth(deps));

    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });

    return app;
}

/** Start the health API on `port`; resolves once the server is listening. */
export function startApiServer(deps: ApiServerDeps, port: number): Promise<Server> {
    const server = createServer(createApiApp(deps));

    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, () => {
            server.off('error', reject);
            logConsole('info', `[Smoke API] Health endpoint listening on http://localhost:${port}/health`);
            resolve(server);
        });
    });
}
