import { JobStateError } from "../errors/errors";
import { assertTransition } from "./job.state";
import { Job, JobUpdate } from "./types";

/**
 * Persistence seam for jobs. Implementations hand out copies, so a caller
 * holding a job never observes later updates through it.
 */
export interface JobStore {
  create(job: Job): Promise<Job>;
  get(id: string): Promise<Job | undefined>;
  /** Applies `update`; a status change must be a legal transition. */
  update(id: string, update: JobUpdate): Promise<Job>;
  list(): Promise<Job[]>;
}

function copyJob(job: Job): Job {
  return structuredClone(job);
}

export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, Job>();

  async create(job: Job): Promise<Job> {
    if (this.jobs.has(job.id)) {
      throw new JobStateError(`Job ${job.id} already exists`);
    }
    this.jobs.set(job.id, copyJob(job));
    return copyJob(job);
  }

  async get(id: string): Promise<Job | undefined> {
    const job = this.jobs.get(id);
    return job ? copyJob(job) : undefined;
  }

  async update(id: string, update: JobUpdate): Promise<Job> {
    const current = this.jobs.get(id);
    if (!current) {
      throw new JobStateError(`Job ${id} not found`);
    }
    if (update.status !== undefined) {
      assertTransition(id, current.status, update.status);
    }

    const next = copyJob({ ...current, ...update });
    this.jobs.set(id, next);
    return copyJob(next);
  }

  async list(): Promise<Job[]> {
    return Array.from(this.jobs.values())
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map(copyJob);
  }
}
