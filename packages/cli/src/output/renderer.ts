import pc from 'picocolors';
import type { RunSummary } from '@mender/shared';

const GOOD_TAGS = new Set(['SUCCESS']);
const SOFT_TAGS = new Set(['PARTIAL', 'STOPPED']);

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  return `${Math.floor(seconds / 60)}m ${Math.round(seconds % 60)}s`;
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  render(summary: RunSummary, summaryPath?: string): void {
    if (this.isJson) {
      console.log(JSON.stringify(summary, null, 2));
    } else {
      this.renderHuman(summary, summaryPath);
    }
  }

  private renderHuman(summary: RunSummary, summaryPath?: string): void {
    const headline = `${summary.tag}: ${summary.message}`;
    if (GOOD_TAGS.has(summary.tag)) {
      console.log(`\n${pc.green(`✅ ${headline}`)}`);
    } else if (SOFT_TAGS.has(summary.tag)) {
      console.log(`\n${pc.yellow(`⚠️  ${headline}`)}`);
    } else {
      console.log(`\n${pc.red(`❌ ${headline}`)}`);
    }

    console.log(pc.bold('\nStatistics:'));
    console.log(`  Iterations: ${summary.iterations}/${summary.maxIterations}`);
    console.log(`  Issues found: ${summary.issuesFound}`);
    console.log(`  Files modified: ${summary.filesModified}`);
    console.log(`  Duration: ${formatDuration(summary.durationMs)}`);
    const phases = Object.entries(summary.phaseDurationsMs)
      .map(([phase, ms]) => `${phase} ${formatDuration(ms)}`)
      .join(', ');
    if (phases) {
      console.log(`  Phases: ${phases}`);
    }

    if (summary.verdict) {
      const { verdict } = summary;
      console.log(pc.bold('\nLast verdict:'));
      console.log(`  ${verdict.status} / ${verdict.action}: ${verdict.passed} passed, ${verdict.failed} failed`);
      if (verdict.reason) {
        console.log(pc.gray(`  ${verdict.reason}`));
      }
    }

    console.log(pc.bold('\nArtifacts:'));
    console.log(`  Run ID: ${summary.runId}`);
    console.log(`  Trace: ${summary.artifacts.tracePath}`);
    if (summaryPath) {
      console.log(`  Summary: ${summaryPath}`);
    }
  }

  log(message: string): void {
    if (!this.isJson) {
      console.log(pc.gray(message));
    }
  }

  error(message: string | Error): void {
    const msg = message instanceof Error ? message.message : message;
    if (this.isJson) {
      console.error(JSON.stringify({ error: msg }));
    } else {
      console.error(pc.red(msg));
    }
  }
}
