import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import { errorMessage, isRecord, readText } from '../../common/utils/guards';
import { BookMetadata, BookMetadataProvider } from './book-metadata.provider';

export const GOOGLE_BOOKS_HTTP = Symbol('GOOGLE_BOOKS_HTTP');

const DEFAULT_GOOGLE_BOOKS_URL = 'https://www.googleapis.com/books/v1/volumes';

export function createGoogleBooksHttp(configService: ConfigService): AxiosInstance {
  return axios.create({
    timeout: configService.get<number>('app.metadataTimeoutMs') ?? 5000,
  });
}

/** Picks authors, description and thumbnail out of the first volume hit. */
export function readVolumeInfo(data: unknown): BookMetadata | null {
  if (!isRecord(data) || !Array.isArray(data.items) || !data.items.length) return null;
  if (typeof data.totalItems === 'number' && data.totalItems <= 0) return null;

  const first: unknown = data.items[0];
  if (!isRecord(first) || !isRecord(first.volumeInfo)) return null;
  const info = first.volumeInfo;

  const authors = Array.isArray(info.authors)
    ? info.authors
        .filter((author): author is string => typeof author === 'string')
        .map((author) => author.trim())
        .filter(Boolean)
    : [];

  return {
    authors,
    description: readText(info.description),
    thumbnailUrl: isRecord(info.imageLinks) ? readText(info.imageLinks.thumbnail) : null,
  };
}

@Injectable()
export class GoogleBooksService extends BookMetadataProvider {
  private readonly logger = new Logger(GoogleBooksService.name);
  private readonly apiKey: string | null;
  private readonly url: string;

  constructor(
    private readonly configService: ConfigService,
    @Inject(GOOGLE_BOOKS_HTTP) private readonly http: AxiosInstance,
  ) {
    super();
    this.apiKey = this.configService.get<string | null>('metadata.googleBooksApiKey') ?? null;
    this.url = this.configService.get<string>('metadata.googleBooksUrl') ?? DEFAULT_GOOGLE_BOOKS_URL;
  }

  async lookup(title: string, author?: string | null): Promise<BookMetadata | null> {
    if (!this.apiKey) {
      this.logger.debug('Google Books API key not configured; skipping enrichment');
      return null;
    }

    const terms = [`intitle:"${title.replace(/"/g, '')}"`];
    if (author) {
      terms.push(`inauthor:"${author.replace(/"/g, '')}"`);
    }

    try {
      const res = await this.http.get<unknown>(this.url, {
        params: { q: terms.join(' '), key: this.apiKey, maxResults: 1 },
      });
      return readVolumeInfo(res.data);
    } catch (error) {
      this.logger.warn(`Google Books lookup for '${title}' failed: ${errorMessage(error)}`);
      return null;
    }
  }
}
