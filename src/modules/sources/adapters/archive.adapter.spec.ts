import { Logger } from '@nestjs/common';
import { createStubHttp } from '../testing/stub-http';
import { ArchiveSourceAdapter, isPrimaryAudioFile, selectArchiveChapters } from './archive.adapter';

const identifier = 'moby_dick_librivox';
const item = { title: 'Moby Dick', sourceName: 'librivox', url: `https://archive.org/details/${identifier}` };

const metadataDocument = {
  metadata: {
    title: 'Moby Dick, or the Whale',
    creator: 'Herman Melville',
    description: 'Read by volunteers.',
  },
  files: [
    { name: 'mobydick_002_melville.mp3', title: 'Chapter 2: The Carpet-Bag' },
    { name: 'mobydick_001_melville_64kb.mp3', title: 'Chapter 1 (64kb)' },
    { name: 'mobydick_001_melville.mp3', title: 'Chapter 1: Loomings' },
    { name: 'mobydick_003_melville.ogg' },
    { name: 'mobydick_128kb.mp3' },
    { name: 'mobydick_cover.jpg' },
    { name: 'mobydick_files.xml' },
  ],
};

describe('isPrimaryAudioFile', () => {
  it('accepts original mp3 and ogg files only', () => {
    expect(isPrimaryAudioFile('chapter_01.mp3')).toBe(true);
    expect(isPrimaryAudioFile('chapter_01.ogg')).toBe(true);
    expect(isPrimaryAudioFile('chapter_01_64kb.mp3')).toBe(false);
    expect(isPrimaryAudioFile('chapter_01_128kb.ogg')).toBe(false);
    expect(isPrimaryAudioFile('chapter_01.flac')).toBe(false);
    expect(isPrimaryAudioFile('chapter_01.mp3.xml')).toBe(false);
  });
});

describe('selectArchiveChapters', () => {
  it('sorts by title and builds download URLs', () => {
    expect(selectArchiveChapters(identifier, metadataDocument.files)).toEqual([
      {
        title: 'Chapter 1: Loomings',
        url: 'https://archive.org/download/moby_dick_librivox/mobydick_001_melville.mp3',
      },
      {
        title: 'Chapter 2: The Carpet-Bag',
        url: 'https://archive.org/download/moby_dick_librivox/mobydick_002_melville.mp3',
      },
      {
        title: 'mobydick_003_melville.ogg',
        url: 'https://archive.org/download/moby_dick_librivox/mobydick_003_melville.ogg',
      },
    ]);
  });

  it('titles nested files by their base name and encodes each path segment', () => {
    expect(selectArchiveChapters('item', [{ name: 'disc 1/track 01.mp3' }])).toEqual([
      { title: 'track 01.mp3', url: 'https://archive.org/download/item/disc%201/track%2001.mp3' },
    ]);
  });

  it('ignores a files value that is not a list', () => {
    expect(selectArchiveChapters(identifier, { name: 'a.mp3' })).toEqual([]);
  });
});

describe('ArchiveSourceAdapter', () => {
  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('search', () => {
    it('queries the collection and maps docs with an identifier', async () => {
      const { client, requests } = createStubHttp({
        'https://archive.org/advancedsearch.php': () => ({
          response: {
            docs: [
              { identifier, title: 'Moby Dick', creator: 'Herman Melville' },
              { title: 'No identifier' },
              { identifier: 'typee_librivox' },
            ],
          },
        }),
      });
      const source = new ArchiveSourceAdapter('librivox', undefined, { client });

      const items = await source.search('moby dick');

      expect(requests[0].params).toEqual({
        q: 'collection:librivoxaudio AND title:(moby dick)',
        fl: ['identifier', 'title', 'creator'],
        output: 'json',
        rows: 50,
      });
      expect(items).toEqual([
        { title: 'Moby Dick', sourceName: 'librivox', url: 'https://archive.org/details/moby_dick_librivox' },
        { title: 'Unknown Title', sourceName: 'librivox', url: 'https://archive.org/details/typee_librivox' },
      ]);
    });

    it('searches the configured collection', async () => {
      const { client, requests } = createStubHttp({
        'https://archive.org/advancedsearch.php': () => ({ response: { docs: [] } }),
      });
      const source = new ArchiveSourceAdapter('radio', 'oldtimeradio', { client });

      await expect(source.search('shadow')).resolves.toEqual([]);
      expect(requests[0].params.q).toBe('collection:oldtimeradio AND title:(shadow)');
    });

    it('returns an empty list for an unexpected body', async () => {
      const { client } = createStubHttp({ 'https://archive.org/advancedsearch.php': () => 'maintenance' });
      const source = new ArchiveSourceAdapter('librivox', undefined, { client });

      await expect(source.search('moby dick')).resolves.toEqual([]);
    });

    it('returns an empty list when the request fails', async () => {
      const { client } = createStubHttp({});
      const source = new ArchiveSourceAdapter('librivox', undefined, { client });

      await expect(source.search('moby dick')).resolves.toEqual([]);
      expect(Logger.prototype.error).toHaveBeenCalledTimes(1);
    });
  });

  describe('getDetails', () => {
    it('builds the audiobook from the metadata document', async () => {
      const { client } = createStubHttp({
        'https://archive.org/metadata/moby_dick_librivox': () => metadataDocument,
      });
      const source = new ArchiveSourceAdapter('librivox', undefined, { client });

      const audiobook = await source.getDetails(item);

      expect(audiobook).toEqual({
        title: 'Moby Dick, or the Whale',
        sourceName: 'librivox',
        url: 'https://archive.org/details/moby_dick_librivox',
        author: 'Herman Melville',
        description: 'Read by volunteers.',
        coverImageUrl: 'https://archive.org/services/img/moby_dick_librivox',
        chapters: selectArchiveChapters(identifier, metadataDocument.files),
      });
    });

    it('falls back to the item title and an unknown author', async () => {
      const { client } = createStubHttp({
        'https://archive.org/metadata/moby_dick_librivox': () => ({ files: [{ name: 'part_1.mp3' }] }),
      });
      const source = new ArchiveSourceAdapter('librivox', undefined, { client });

      const audiobook = await source.getDetails(item);

      expect(audiobook?.title).toBe('Moby Dick');
      expect(audiobook?.author).toBe('Unknown');
      expect(audiobook?.description).toBeNull();
    });

    it('joins a multi-part description with newlines', async () => {
      const { client } = createStubHttp({
        'https://archive.org/metadata/moby_dick_librivox': () => ({
          metadata: { description: ['First part.', 'Second part.'] },
          files: [{ name: 'part_1.mp3' }],
        }),
      });
      const source = new ArchiveSourceAdapter('librivox', undefined, { client });

      const audiobook = await source.getDetails(item);

      expect(audiobook?.description).toBe('First part.\nSecond part.');
    });

    it('returns null when no primary audio file is listed', async () => {
      const { client } = createStubHttp({
        'https://archive.org/metadata/moby_dick_librivox': () => ({
          files: [{ name: 'part_1_64kb.mp3' }, { name: 'cover.jpg' }],
        }),
      });
      const source = new ArchiveSourceAdapter('librivox', undefined, { client });

      await expect(source.getDetails(item)).resolves.toBeNull();
    });

    it('returns null without a request when the URL has no identifier', async () => {
      const { client, requests } = createStubHttp({});
      const source = new ArchiveSourceAdapter('librivox', undefined, { client });

      await expect(source.getDetails({ ...item, url: 'https://archive.org/details/' })).resolves.toBeNull();
      expect(requests).toHaveLength(0);
    });

    it('returns null when the request fails', async () => {
      const { client } = createStubHttp({});
      const source = new ArchiveSourceAdapter('librivox', undefined, { client });

      await expect(source.getDetails(item)).resolves.toBeNull();
    });
  });
});
