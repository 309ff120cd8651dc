export type JobType = "process";

export type JobStatus = "waiting" | "active" | "completed" | "failed" | "delayed";

export interface JobData {
  type: JobType;
}

export interface ProcessJobData extends JobData {
  type: "process";
  filePath: string;
  title: string;
  documentId?: string;
}

export interface JobResult {
  success: boolean;
  processedAt: Date;
  duration: number;
  documentId?: string;
  qualityScore?: number;
  error?: string;
  metrics?: Record<string, number>;
}
