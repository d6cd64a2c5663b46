import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SourcesController } from './sources.controller';
import { SourceRegistry, createSourceRegistry } from './source.registry';

@Module({
  controllers: [SourcesController],
  providers: [
    {
      provide: SourceRegistry,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => createSourceRegistry(config),
    },
  ],
  exports: [SourceRegistry],
})
export class SourcesModule {}
