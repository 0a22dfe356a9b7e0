/**
 * Base interface for all run events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the digest run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted once the run settings are resolved and the output directory exists.
 */
export interface RunStarted extends BaseEvent {
  type: 'RunStarted';
  payload: {
    rootDir: string;
    outputDir: string;
    maxLines: number;
    maxDepth: number;
    excludePatterns: string[];
    includePatterns: string[];
  };
}

/** Emitted after a whole-directory digest has been produced and measured */
export interface DirectoryAnalyzed extends BaseEvent {
  type: 'DirectoryAnalyzed';
  payload: {
    relDir: string;
    depth: number;
    lineCount: number;
  };
}

/** Emitted when a whole-directory digest is kept as the directory's final digest */
export interface DigestKept extends BaseEvent {
  type: 'DigestKept';
  payload: {
    relDir: string;
    depth: number;
    digestFile: string;
    lineCount: number;
    /** True when the size budget was exceeded but the depth bound forced a keep */
    depthLimited: boolean;
  };
}

/** Emitted when a directory is split into a local-only digest plus child digests */
export interface DirectorySplit extends BaseEvent {
  type: 'DirectorySplit';
  payload: {
    relDir: string;
    depth: number;
    digestFile: string;
    /** Lines in the whole-directory digest that triggered the split */
    totalLineCount: number;
    /** Lines in the local-only digest that was kept */
    localLineCount: number;
    childDirs: string[];
  };
}

/** Emitted when a child directory is skipped because a global exclude pattern matches its name */
export interface DirectorySkipped extends BaseEvent {
  type: 'DirectorySkipped';
  payload: {
    relDir: string;
    depth: number;
  };
}

/** Emitted when the index manifest has been written */
export interface IndexWritten extends BaseEvent {
  type: 'IndexWritten';
  payload: {
    indexPath: string;
    digestCount: number;
  };
}

/** Emitted when the run completes successfully */
export interface RunFinished extends BaseEvent {
  type: 'RunFinished';
  payload: {
    durationMs: number;
    digestCount: number;
    splitCount: number;
  };
}

export type DigestEvent =
  | RunStarted
  | DirectoryAnalyzed
  | DigestKept
  | DirectorySplit
  | DirectorySkipped
  | IndexWritten
  | RunFinished;

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Common metadata for a new event, stamped with the current time.
 */
export function eventBase(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
  };
}
