import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { MetadataModule } from '../metadata/metadata.module';
import { SourcesModule } from '../sources/sources.module';
import { DetailsController } from './details.controller';
import { DetailsProcessor } from './details.processor';
import { DetailsService, QUEUE_DETAILS } from './details.service';

@Module({
  imports: [
    SourcesModule,
    MetadataModule,
    BullModule.registerQueue({
      name: QUEUE_DETAILS,
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: { age: 600 },
        removeOnFail: { age: 600 },
      },
    }),
  ],
  controllers: [DetailsController],
  providers: [DetailsService, DetailsProcessor],
})
export class DetailsModule {}
