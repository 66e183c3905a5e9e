export interface Segment {
  index: number; // 1-based, insertion order
  start: number; // seconds
  end: number; // seconds
  text: string; // may span several lines
}

export function segmentDuration(segment: Segment): number {
  return segment.end - segment.start;
}

export interface TranscriptionResult {
  readonly requestId: string;
  readonly inputPath: string;
  readonly outputPath: string; // "" when the engine failed
  readonly format: string;
  readonly success: boolean;
  readonly error?: string;
}

export interface BatchFileResult {
  readonly filePath: string;
  readonly success: boolean;
  readonly outputPath?: string;
  readonly error?: string;
  readonly durationSeconds: number;
  readonly timestamp: string; // ISO-8601
}

export interface BatchSummary {
  totalFiles: number;
  successful: number;
  failed: number;
  skipped: number;
  totalDurationSeconds: number;
  results: BatchFileResult[];
}

/** Stage progress for a single file, 0..1. */
export type StageCallback = (stage: string, progress: number) => void;

/** Per-file progress for batch runs; `status` is "processing", "complete" or "failed: <reason>". */
export type BatchProgressCallback = (filePath: string, current: number, total: number, status: string) => void;

export function emptySummary(): BatchSummary {
  return {
    totalFiles: 0,
    successful: 0,
    failed: 0,
    skipped: 0,
    totalDurationSeconds: 0,
    results: [],
  };
}
