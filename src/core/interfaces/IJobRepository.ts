import { CandidateRecord } from '../entities/CandidateRecord.js';
import { Job, JobStatus } from '../entities/Job.js';

/**
 * Interface for job persistence
 */
export interface IJobRepository {
  /**
   * Upsert the job row and any reasoning entries or attempts not yet stored
   */
  saveJob(job: Job): void;

  loadJob(jobId: string): Job | null;

  getAllJobs(status?: JobStatus): Job[];

  /** Records are append-only; saving one twice is a no-op */
  saveCandidateRecords(records: readonly CandidateRecord[]): void;

  loadCandidateRecords(jobId: string): CandidateRecord[];

  deleteJobsByAge(hoursOld: number): number;
}
