import * as fs from 'fs/promises';
import { join } from './path';

export const MENDER_DIR = '.mender';
export const RUNS_DIR = 'runs';

export interface RunArtifactPaths {
  root: string;
  trace: string;
  summary: string;
}

export function getRunArtifactPaths(baseDir: string, runId: string): RunArtifactPaths {
  const runRootDir = join(baseDir, MENDER_DIR, RUNS_DIR, runId);
  return {
    root: runRootDir,
    trace: join(runRootDir, 'trace.jsonl'),
    summary: join(runRootDir, 'summary.json'),
  };
}

/**
 * Creates `<baseDir>/.mender/runs/<runId>` and returns the artifact paths inside it.
 */
export async function createRunDir(baseDir: string, runId: string): Promise<RunArtifactPaths> {
  const paths = getRunArtifactPaths(baseDir, runId);
  await fs.mkdir(paths.root, { recursive: true });
  return paths;
}
