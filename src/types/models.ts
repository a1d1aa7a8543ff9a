export interface PostRecord {
  id: number;
  md5: string;
  fileUrl: string;
  tags: string;
  image: string;
  filename: string;
}

export type DownloadOutcome = "done" | "existed";

export interface AggregateStatus {
  done: number;
  existed: number;
  failed: number;
}

export interface RunSummary {
  status: AggregateStatus;
  total: number;
  peakConcurrency: number;
  durationMs: number;
}
