import type { Request, Response } from 'express';
import type { HealthData, LivenessData } from '../../types/api.js';
import type { HarnessRunOptions, HarnessSource } from '../../types/health-harness.js';
import { describeError } from '../../types/errors.js';
import { runSmokeSuite } from '../../services/smoke-runner.js';
import { logThought } from '../../utils/logger.js';
import { sendError, sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    /** Called per request so descriptors reflect live state. */
    createSource: () => HarnessSource;
    applicationName: string;
    environment: string;
    runOptions?: HarnessRunOptions;
}

/** GET /health/live: the process is up. Runs no checks. */
export function handleLiveness() {
    return (_req: Request, res: Response): void => {
        const data: LivenessData = {
            status: 'ok',
            uptimeSec: Math.floor((Date.now() - startTime) / 1000),
        };
        sendOk(res, data);
    };
}

/**
 * GET /health runs the full smoke suite and returns the report document.
 *
 * Returns HTTP 200 when every required check passes, HTTP 503 otherwise.
 */
export function handleHealth(deps: HealthDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        try {
            const { run, report } = await runSmokeSuite(deps.createSource(), {
                applicationName: deps.applicationName,
                environment: deps.environment,
                ...deps.runOptions,
            });

            const data: HealthData = {
                status: run.ok ? 'ok' : 'failed',
                failures: run.failures,
                report: report.toDocument(),
            };
            sendOk(res, data, run.ok ? 200 : 503);
        } catch (err) {
            void logThought(`[API] Health run failed: ${describeError(err)}`);
            sendError(res, `Health run failed: ${describeError(err)}`, 500);
        }
    };
}
