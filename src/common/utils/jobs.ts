import { Job } from 'bullmq';

export async function describeJob(job: Job) {
  return {
    id: job.id,
    state: await job.getState(),
    result: job.returnvalue ?? null,
    failedReason: job.failedReason || null,
  };
}
