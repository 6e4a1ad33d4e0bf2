import { JobSnapshot } from '../entities/Job.js';

/**
 * Interface for job persistence
 */
export interface IJobRepository {
  saveJob(job: JobSnapshot): void;

  loadJob(jobId: string): JobSnapshot | null;

  getAllJobs(): JobSnapshot[];

  deleteJob(jobId: string): void;
}
