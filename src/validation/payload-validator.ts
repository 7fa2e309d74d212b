import { z } from 'zod';

export const DEFAULT_MAX_JOBS_PER_REQUEST = 100;

export type ValidationCheck = 'object' | 'jobs' | 'limit' | 'first_job';

export type ValidationOutcome =
  | { valid: true; jobs: unknown[] }
  | { valid: false; check: ValidationCheck; reason: string };

const present = z.unknown().refine(value => value !== undefined && value !== null);

const payloadObjectSchema = z.record(z.string(), z.unknown());
const jobsEnvelopeSchema = z.object({ jobs: z.array(z.unknown()) });
const firstJobSchema = z.object({ id: present, title: present });

/**
 * Structural validation of a decoded webhook body.
 *
 * Only the envelope and the first job are checked here. Individual jobs are
 * validated during reconciliation, where an invalid job is reported without
 * failing the batch.
 */
export class PayloadValidator {
  constructor(private readonly maxJobs: number = DEFAULT_MAX_JOBS_PER_REQUEST) {}

  validate(decoded: unknown): ValidationOutcome {
    if (!payloadObjectSchema.safeParse(decoded).success) {
      return { valid: false, check: 'object', reason: 'Payload must be a JSON object' };
    }

    const envelope = jobsEnvelopeSchema.safeParse(decoded);
    if (!envelope.success) {
      return { valid: false, check: 'jobs', reason: 'Payload must contain a "jobs" array' };
    }

    const { jobs } = envelope.data;
    if (jobs.length > this.maxJobs) {
      return {
        valid: false,
        check: 'limit',
        reason: `Payload contains ${jobs.length} jobs, maximum is ${this.maxJobs}`,
      };
    }

    if (jobs.length > 0 && !firstJobSchema.safeParse(jobs[0]).success) {
      return {
        valid: false,
        check: 'first_job',
        reason: 'First job must contain "id" and "title" fields',
      };
    }

    return { valid: true, jobs };
  }
}
