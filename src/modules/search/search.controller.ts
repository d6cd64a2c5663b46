import {
  Body,
  Controller,
  Get,
  NotFoundException,
  Param,
  Post,
  Query,
  ServiceUnavailableException,
} from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { NoSourcesConfiguredError } from '../../common/errors';
import { describeJob } from '../../common/utils/jobs';
import { SearchRequestDto } from './dto/search.dto';
import { QUEUE_SEARCH, SearchJobData, SearchService } from './search.service';

@Controller('search')
export class SearchController {
  constructor(
    private readonly searchService: SearchService,
    @InjectQueue(QUEUE_SEARCH) private readonly searchQueue: Queue<SearchJobData>,
  ) {}

  @Post()
  async search(@Body() body: SearchRequestDto, @Query('inline') inline?: string) {
    if (inline === '1' || inline === 'true') {
      try {
        return await this.searchService.search(body.q);
      } catch (error) {
        if (error instanceof NoSourcesConfiguredError) {
          throw new ServiceUnavailableException(error.message);
        }
        throw error;
      }
    }

    const job = await this.searchQueue.add('search', { query: body.q });
    return { queued: true, jobId: job.id };
  }

  @Get('jobs/:id')
  async job(@Param('id') id: string) {
    const job = await this.searchQueue.getJob(id);
    if (!job) {
      throw new NotFoundException('Search job not found');
    }
    return describeJob(job);
  }
}
