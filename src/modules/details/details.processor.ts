import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Job } from 'bullmq';
import { DetailsJobData, DetailsService, QUEUE_DETAILS } from './details.service';

@Processor(QUEUE_DETAILS)
export class DetailsProcessor extends WorkerHost {
  constructor(private readonly detailsService: DetailsService) {
    super();
  }

  async process(job: Pick<Job<DetailsJobData>, 'data'>) {
    const { item, author } = job.data;
    if (!item?.sourceName || !item.url) {
      throw new Error('Invalid details job payload');
    }
    return this.detailsService.getDetails(item, author);
  }
}
