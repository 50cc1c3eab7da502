export type ReportFormat = 'json' | 'html' | 'markdown';

export interface ReportEntry {
  name: string;
  passed: boolean;
  message: string | null;
  durationMs: number;
}

export interface ReportSummary {
  total: number;
  passed: number;
  failed: number;
  totalDurationMs: number;
}

/** Machine-readable report, as written by `renderJson`. */
export interface SmokeReportDocument {
  applicationName: string;
  environment: string;
  /** Local time, `YYYY-MM-DD HH:mm:ss`. */
  testStartTime: string;
  summary: ReportSummary;
  testResults: Record<string, ReportEntry>;
  logs: string[];
}

export interface RenderedArtifact {
  format: ReportFormat;
  path: string;
  ok: boolean;
  error?: string;
}
