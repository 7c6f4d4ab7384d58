// Core type definitions shared by the sidecar, exiftool and pipeline modules

export type TimestampField =
  | 'photoTakenTime.timestamp'
  | 'creationTime.timestamp'
  | 'creationTime.formatted'
  | 'modificationTime.formatted';

export interface ResolvedTimestamp {
  /** UTC epoch seconds */
  epochSeconds: number;
  field: TimestampField;
}

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export type ExecutionStatus = 'success' | 'transient_failure' | 'permanent_failure' | 'timeout';

export interface ExecutionOutcome {
  status: ExecutionStatus;
  /** Tool invocations made, 0 for a dry run */
  attempts: number;
  reason?: string;
}

export type FailureStage = 'match' | 'parse' | 'resolve' | 'execute' | 'processing';

export interface FailureRecord {
  /** Sidecar path for match/parse failures, media path afterwards */
  path: string;
  stage: FailureStage;
  reason: string;
}

export interface RunSummary {
  processed: number;
  succeeded: number;
  failed: number;
}
