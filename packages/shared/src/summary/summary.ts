import path from 'node:path';
import { atomicWrite } from '../fs/io';
import { redactForLogs } from '../redaction';

export const RUN_SUMMARY_SCHEMA_VERSION = 1;

export interface RunSummary {
  schemaVersion: typeof RUN_SUMMARY_SCHEMA_VERSION;
  runId: string;
  command: string[];
  /** Absolute path of the directory the workers operated on */
  target: string;
  startedAt: string; // ISO 8601
  finishedAt: string; // ISO 8601
  durationMs: number;
  /** Terminal tag of the control loop, e.g. SUCCESS or PARTIAL */
  tag: string;
  message: string;
  iterations: number;
  maxIterations: number;
  issuesFound: number;
  filesModified: number;
  phaseDurationsMs: Record<string, number>;
  verdict?: {
    status: string;
    action: string;
    allPassed: boolean;
    total: number;
    passed: number;
    failed: number;
    reason: string;
  };
  selectedProviders: {
    auditor: string;
    fixer: string;
    judge?: string;
  };
  artifacts: {
    tracePath: string;
  };
}

export class SummaryWriter {
  static async write(summary: RunSummary, runDir: string): Promise<string> {
    const summaryPath = path.join(runDir, 'summary.json');
    const summaryJson = JSON.stringify(redactForLogs(summary), null, 2);
    await atomicWrite(summaryPath, summaryJson);
    return summaryPath;
  }
}
