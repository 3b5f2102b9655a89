import { EvaluationMetrics } from "../evaluation/types";
import { Analysis, JudgeVerdict } from "../rag/types";

export type JobStatus = "pending" | "processing" | "completed" | "failed";

export interface Job {
  id: string;
  status: JobStatus;
  fileName: string;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  analysis?: Analysis;
  metrics?: EvaluationMetrics;
  judge?: JudgeVerdict;
  /** Message of the error that failed the job, verbatim. */
  error?: string;
}

export type JobUpdate = Partial<Omit<Job, "id" | "createdAt" | "fileName">>;
