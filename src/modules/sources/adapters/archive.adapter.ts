import { Logger } from '@nestjs/common';
import { errorMessage, isRecord, readText } from '../../../common/utils/guards';
import { AudioItem, Audiobook, Chapter } from '../dto/audio.dto';
import { HttpSourceAdapter, SourceHttpOptions } from './http-source.base';

export const ARCHIVE_ROOT = 'https://archive.org';
export const DEFAULT_ARCHIVE_COLLECTION = 'librivoxaudio';

const SEARCH_ROWS = 50;
const AUDIO_EXTENSIONS = ['.mp3', '.ogg'];
// Derived transcodes duplicate the original files at lower quality.
const DERIVED_MARKERS = ['64kb', '128kb'];

export function isPrimaryAudioFile(fileName: string): boolean {
  return (
    AUDIO_EXTENSIONS.some((ext) => fileName.endsWith(ext)) &&
    !DERIVED_MARKERS.some((marker) => fileName.includes(marker))
  );
}

function compareTitles(a: Chapter, b: Chapter) {
  if (a.title < b.title) return -1;
  if (a.title > b.title) return 1;
  return 0;
}

/**
 * Turns the `files` list of an item's metadata document into chapters. The
 * archive lists files in no particular order; sorting by title restores track
 * order for the collection's `<book>_<nn>_<author>` naming.
 */
export function selectArchiveChapters(identifier: string, files: unknown, root = ARCHIVE_ROOT): Chapter[] {
  if (!Array.isArray(files)) return [];

  const chapters: Chapter[] = [];
  for (const file of files) {
    if (!isRecord(file) || typeof file.name !== 'string') continue;
    const fileName = file.name;
    if (!isPrimaryAudioFile(fileName)) continue;

    const baseName = fileName.split('/').pop() ?? fileName;
    const encodedPath = fileName.split('/').map(encodeURIComponent).join('/');
    chapters.push({
      title: readText(file.title) ?? baseName.trim(),
      url: `${root}/download/${identifier}/${encodedPath}`,
    });
  }
  return chapters.sort(compareTitles);
}

export class ArchiveSourceAdapter extends HttpSourceAdapter {
  readonly kind = 'archive';

  private readonly logger: Logger;

  constructor(
    name: string,
    private readonly collection: string = DEFAULT_ARCHIVE_COLLECTION,
    options?: SourceHttpOptions,
  ) {
    super(name, ARCHIVE_ROOT, options);
    this.logger = new Logger(`${ArchiveSourceAdapter.name}:${name}`);
  }

  async search(query: string): Promise<AudioItem[]> {
    try {
      const res = await this.http.get<unknown>(`${this.baseUrl}/advancedsearch.php`, {
        params: {
          q: `collection:${this.collection} AND title:(${query})`,
          fl: ['identifier', 'title', 'creator'],
          output: 'json',
          rows: SEARCH_ROWS,
        },
      });

      const body = res.data;
      const response: Record<string, unknown> =
        isRecord(body) && isRecord(body.response) ? body.response : {};
      const docs = Array.isArray(response.docs) ? response.docs : [];

      const results: AudioItem[] = [];
      for (const doc of docs) {
        if (!isRecord(doc)) continue;
        const identifier = readText(doc.identifier);
        if (!identifier) continue;
        results.push({
          title: readText(doc.title) ?? 'Unknown Title',
          sourceName: this.name,
          url: `${this.baseUrl}/details/${identifier}`,
        });
      }
      return results;
    } catch (error) {
      this.logger.error(`Error searching the archive: ${errorMessage(error)}`);
      return [];
    }
  }

  async getDetails(item: AudioItem): Promise<Audiobook | null> {
    const identifier = (item.url.split('/').pop() ?? '').trim();
    if (!identifier) return null;

    try {
      const res = await this.http.get<unknown>(`${this.baseUrl}/metadata/${identifier}`);
      const document: Record<string, unknown> = isRecord(res.data) ? res.data : {};

      const chapters = selectArchiveChapters(identifier, document.files, this.baseUrl);
      if (!chapters.length) {
        this.logger.warn(`No primary audio files for ${identifier}`);
        return null;
      }

      const metadata: Record<string, unknown> = isRecord(document.metadata) ? document.metadata : {};
      return {
        title: readText(metadata.title) ?? item.title,
        sourceName: this.name,
        url: item.url,
        author: readText(metadata.creator) ?? 'Unknown',
        description: readText(metadata.description, '\n'),
        coverImageUrl: `${this.baseUrl}/services/img/${identifier}`,
        chapters,
      };
    } catch (error) {
      this.logger.error(`Error getting details for ${identifier}: ${errorMessage(error)}`);
      return null;
    }
  }
}
