import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Job } from 'bullmq';
import { QUEUE_SEARCH, SearchJobData, SearchService } from './search.service';

@Processor(QUEUE_SEARCH)
export class SearchProcessor extends WorkerHost {
  constructor(private readonly searchService: SearchService) {
    super();
  }

  async process(job: Pick<Job<SearchJobData>, 'data'>) {
    const query = String(job.data?.query ?? '').trim();
    if (!query) {
      throw new Error('Invalid search query');
    }
    return this.searchService.search(query);
  }
}
