import { Controller, Get } from '@nestjs/common';
import { SourceRegistry } from './source.registry';

@Controller('sources')
export class SourcesController {
  constructor(private readonly registry: SourceRegistry) {}

  @Get()
  list() {
    return this.registry.list().map((source) => ({
      name: source.name,
      kind: source.kind,
      baseUrl: source.baseUrl,
    }));
  }
}
