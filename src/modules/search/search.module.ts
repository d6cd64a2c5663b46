import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { SourcesModule } from '../sources/sources.module';
import { SearchController } from './search.controller';
import { SearchProcessor } from './search.processor';
import { QUEUE_SEARCH, SearchService } from './search.service';

@Module({
  imports: [
    SourcesModule,
    BullModule.registerQueue({
      name: QUEUE_SEARCH,
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: { age: 600 },
        removeOnFail: { age: 600 },
      },
    }),
  ],
  controllers: [SearchController],
  providers: [SearchService, SearchProcessor],
  exports: [SearchService],
})
export class SearchModule {}
