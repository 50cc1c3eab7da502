import type { CheckFailure } from './health-harness.js';
import type { SmokeReportDocument } from './report.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

export interface LivenessData {
    status: 'ok';
    uptimeSec: number;
}

export interface HealthData {
    status: 'ok' | 'failed';
    failures: CheckFailure[];
    report: SmokeReportDocument;
}
