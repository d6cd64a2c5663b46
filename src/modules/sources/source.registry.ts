import { Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SourceNotFoundError } from '../../common/errors';
import { AudioSource } from './adapters/audio-source.interface';
import { buildAllSources } from './source.factory';

/** The session's sources, built once at startup and read-only afterwards. */
export class SourceRegistry implements OnModuleDestroy {
  private readonly logger = new Logger(SourceRegistry.name);

  constructor(private readonly sources: readonly AudioSource[]) {}

  get size() {
    return this.sources.length;
  }

  list(): readonly AudioSource[] {
    return this.sources;
  }

  findByName(name: string): AudioSource {
    const source = this.sources.find((candidate) => candidate.name === name);
    if (!source) throw new SourceNotFoundError(name);
    return source;
  }

  async onModuleDestroy() {
    await Promise.all(this.sources.map((source) => source.close()));
    this.logger.log(`Closed ${this.sources.length} sources`);
  }
}

export function createSourceRegistry(config: ConfigService): SourceRegistry {
  const logger = new Logger(SourceRegistry.name);
  const entries = config.get<unknown[]>('sources.entries') ?? [];
  const sources = buildAllSources(entries, {
    timeoutMs: config.get<number>('app.sourceRequestTimeoutMs'),
  });

  logger.log(`Registered ${sources.length} of ${entries.length} configured sources`);
  return new SourceRegistry(sources);
}
