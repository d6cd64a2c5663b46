import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TIMED_OUT, withDeadline } from '../../common/utils/deadline';
import { errorMessage } from '../../common/utils/guards';
import { BookMetadata, BookMetadataProvider } from '../metadata/book-metadata.provider';
import { AudioSource } from '../sources/adapters/audio-source.interface';
import { AudioItem, Audiobook } from '../sources/dto/audio.dto';
import { SourceRegistry } from '../sources/source.registry';

export const QUEUE_DETAILS = 'audio-details';

export const DEFAULT_METADATA_TIMEOUT_MS = 5000;

export interface DetailsJobData {
  item: AudioItem;
  author?: string | null;
}

/** External values win field by field; scraped values fill the gaps. */
export function mergeAudiobook(audiobook: Audiobook, metadata: BookMetadata): Audiobook {
  return {
    ...audiobook,
    author: metadata.authors.length ? metadata.authors.join(', ') : audiobook.author,
    description: metadata.description ?? audiobook.description,
    coverImageUrl: metadata.thumbnailUrl ?? audiobook.coverImageUrl,
  };
}

@Injectable()
export class DetailsService {
  private readonly logger = new Logger(DetailsService.name);

  constructor(
    private readonly registry: SourceRegistry,
    private readonly metadataProvider: BookMetadataProvider,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Scraped detail and metadata enrichment start together. Without chapters
   * there is nothing to play, so a miss returns at once without waiting on
   * the lookup.
   *
   * @throws SourceNotFoundError when `item.sourceName` is not registered
   */
  async getDetails(item: AudioItem, author?: string | null): Promise<Audiobook | null> {
    const source = this.registry.findByName(item.sourceName);

    // fetchMetadata never rejects.
    const metadataLookup = this.fetchMetadata(item.title, author);
    const audiobook = await this.fetchDetails(source, item);

    if (!audiobook || !audiobook.chapters.length) {
      this.logger.warn(`No chapters resolved for '${item.title}' on ${source.name}`);
      return null;
    }

    const metadata = await metadataLookup;
    return metadata ? mergeAudiobook(audiobook, metadata) : audiobook;
  }

  private async fetchDetails(source: AudioSource, item: AudioItem): Promise<Audiobook | null> {
    try {
      return await source.getDetails(item);
    } catch (error) {
      this.logger.error(`Source ${source.name} failed to load '${item.title}': ${errorMessage(error)}`);
      return null;
    }
  }

  private async fetchMetadata(title: string, author?: string | null): Promise<BookMetadata | null> {
    const timeoutMs = this.configService.get<number>('app.metadataTimeoutMs') ?? DEFAULT_METADATA_TIMEOUT_MS;
    try {
      const metadata = await withDeadline(this.metadataProvider.lookup(title, author), timeoutMs);
      if (metadata === TIMED_OUT) {
        this.logger.warn(`Metadata lookup for '${title}' timed out after ${timeoutMs}ms`);
        return null;
      }
      return metadata;
    } catch (error) {
      this.logger.warn(`Metadata lookup for '${title}' failed: ${errorMessage(error)}`);
      return null;
    }
  }
}
