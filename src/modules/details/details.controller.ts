import { Body, Controller, Get, NotFoundException, Param, Post, Query } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { SourceNotFoundError } from '../../common/errors';
import { describeJob } from '../../common/utils/jobs';
import { DetailsRequestDto } from './dto/details.dto';
import { DetailsJobData, DetailsService, QUEUE_DETAILS } from './details.service';

@Controller('details')
export class DetailsController {
  constructor(
    private readonly detailsService: DetailsService,
    @InjectQueue(QUEUE_DETAILS) private readonly detailsQueue: Queue<DetailsJobData>,
  ) {}

  @Post()
  async details(@Body() body: DetailsRequestDto, @Query('inline') inline?: string) {
    const item = { title: body.title, sourceName: body.sourceName, url: body.url };

    if (inline === '1' || inline === 'true') {
      const audiobook = await this.detailsService
        .getDetails(item, body.author)
        .catch((error: unknown) => {
          if (error instanceof SourceNotFoundError) {
            throw new NotFoundException(error.message);
          }
          throw error;
        });
      if (!audiobook) {
        throw new NotFoundException('Could not load chapters for this item');
      }
      return audiobook;
    }

    const job = await this.detailsQueue.add('details', { item, author: body.author ?? null });
    return { queued: true, jobId: job.id };
  }

  @Get('jobs/:id')
  async job(@Param('id') id: string) {
    const job = await this.detailsQueue.getJob(id);
    if (!job) {
      throw new NotFoundException('Details job not found');
    }
    return describeJob(job);
  }
}
