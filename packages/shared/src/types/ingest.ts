/**
 * A single request to produce a text digest of one directory.
 */
export interface IngestRequest {
  /** Directory to ingest */
  source: string;
  /** File the digest is written to; created or overwritten */
  outputPath: string;
  excludePatterns: string[];
  includePatterns: string[];
  /** Skip files larger than this many bytes */
  maxSize?: number;
  /** Source-control branch to ingest */
  branch?: string;
}

/**
 * Boundary to the external ingestion capability.
 *
 * Implementations resolve once the digest file exists and reject with
 * `MissingToolError` or `ProcessError` otherwise.
 */
export interface DigestInvoker {
  ingest(request: IngestRequest): Promise<void>;
}

/**
 * One produced digest file.
 */
export interface DigestRecord {
  /** Directory relative to the run root; the root itself is `.` */
  relDir: string;
  digestFile: string;
  lineCount: number;
  depth: number;
  /** True when subdirectories were given their own digests */
  split: boolean;
}
