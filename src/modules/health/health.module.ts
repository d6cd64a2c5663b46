import { Module } from '@nestjs/common';
import { SourcesModule } from '../sources/sources.module';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

@Module({
  imports: [SourcesModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
