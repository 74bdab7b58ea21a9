export interface PostJob {
  readonly imagePath: string;
  /** imagePath의 basename. CSV 매칭 키 */
  readonly filename: string;
  readonly title: string;
  readonly description: string;
  readonly link?: string;
  readonly boardName: string;
}

export interface MetadataOverrideRecord {
  filename: string;
  title?: string;
  description?: string;
  link?: string;
  board?: string;
}

/** 모든 잡에 공통으로 적용되는 기본 메타데이터 (CSV가 없으면 유일한 소스) */
export interface DefaultMetadata {
  readonly title: string;
  readonly description: string;
  readonly link: string;
  readonly boardName: string;
}

export interface SkippedJob {
  imagePath: string;
  filename: string;
  reason: string;
}

export type JobStatus =
  | { kind: 'succeeded' }
  | { kind: 'failed'; reason: string; state: string }
  | { kind: 'unknown'; reason: string }
  | { kind: 'skipped'; reason: string };

export interface JobOutcome {
  filename: string;
  imagePath: string;
  job?: PostJob;
  status: JobStatus;
  attempts: number;
  elapsedMs: number;
}

export interface BatchCounts {
  total: number;
  succeeded: number;
  failed: number;
  unknown: number;
  skipped: number;
}

export type BatchAbortKind = 'session_lost' | 'interrupted';

export interface BatchResult {
  outcomes: JobOutcome[];
  counts: BatchCounts;
  abort?: { kind: BatchAbortKind; reason: string };
  startedAt: string;
  finishedAt: string;
}
