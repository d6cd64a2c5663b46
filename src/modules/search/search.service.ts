import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NoSourcesConfiguredError } from '../../common/errors';
import { SourceRegistry } from '../sources/source.registry';
import { AudioItem } from '../sources/dto/audio.dto';
import { DEFAULT_SEARCH_TIMEOUT_MS, SourceFailure, searchAll } from './search-all';

export const QUEUE_SEARCH = 'audio-search';

export interface SearchJobData {
  query: string;
}

export interface SearchResponse {
  query: string;
  total: number;
  items: AudioItem[];
  failures: SourceFailure[];
}

@Injectable()
export class SearchService {
  constructor(
    private readonly registry: SourceRegistry,
    private readonly configService: ConfigService,
  ) {}

  async search(query: string): Promise<SearchResponse> {
    if (!this.registry.size) {
      throw new NoSourcesConfiguredError();
    }

    const timeoutMs = this.configService.get<number>('app.searchTimeoutMs') ?? DEFAULT_SEARCH_TIMEOUT_MS;
    const { items, failures } = await searchAll(this.registry.list(), query, { timeoutMs });

    return { query, total: items.length, items, failures };
  }
}
