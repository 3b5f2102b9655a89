import { JobStateError } from "../errors/errors";
import { JobStatus } from "./types";

// completed and failed are terminal.
const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ["processing"],
  processing: ["completed", "failed"],
  completed: [],
  failed: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(jobId: string, from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new JobStateError(`Job ${jobId} cannot move from ${from} to ${to}`);
  }
}
