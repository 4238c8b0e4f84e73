export interface ScanOptions {
  /** Gitignore-style patterns a file must match to be kept. Empty or absent keeps everything. */
  include?: string[];
  /** Gitignore-style patterns that drop files and whole directories. */
  exclude?: string[];
  maxFileBytes?: number;
  maxFiles?: number;
}

export interface RepoFileMeta {
  /** Relative to the scan root, always with forward slashes */
  path: string;
  absPath: string;
  sizeBytes: number;
  ext: string;
  isText: boolean;
}

export interface RepoSnapshot {
  repoRoot: string;
  files: RepoFileMeta[];
  warnings: string[];
}
