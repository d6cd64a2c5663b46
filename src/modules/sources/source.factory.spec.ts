import { Logger } from '@nestjs/common';
import { buildAllSources, buildSource } from './source.factory';

const rules = {
  search: {
    url: '/?s={query}',
    itemContainerSelector: 'article',
    titleSelector: 'h2 a',
    urlSelector: 'h2 a',
  },
  details: {
    chapterContainerSelector: 'audio',
    chapterUrlSelector: 'source',
  },
};

describe('buildAllSources', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('builds one source per valid record and logs every skipped one', async () => {
    const sources = buildAllSources([
      { name: 'books', baseUrl: 'https://books.example.com', rules },
      { name: 'librivox', type: 'archive' },
      { name: 'no-rules', baseUrl: 'https://norules.example.com' },
      { name: 'videos', type: 'youtube' },
      'not a record',
      { type: 'archive' },
    ]);

    expect(sources.map((source) => [source.name, source.kind])).toEqual([
      ['books', 'custom'],
      ['librivox', 'archive'],
    ]);
    expect(warn).toHaveBeenCalledTimes(4);

    await Promise.all(sources.map((source) => source.close()));
  });

  it('keeps the first of two sources sharing a name', () => {
    const sources = buildAllSources([
      { name: 'books', baseUrl: 'https://books.example.com', rules },
      { name: 'books', type: 'archive' },
    ]);

    expect(sources).toHaveLength(1);
    expect(sources[0].kind).toBe('custom');
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('skips a repeated name before building anything for it', () => {
    const sources = buildAllSources([
      { name: 'books', baseUrl: 'https://books.example.com', rules },
      { name: 'books', type: 'youtube' },
    ]);

    expect(sources.map((source) => source.name)).toEqual(['books']);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('Skipping source books: the name is already registered');
  });

  it('returns an empty list for an empty config', () => {
    expect(buildAllSources([])).toEqual([]);
    expect(warn).not.toHaveBeenCalled();
  });
});

describe('buildSource', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('pins archive sources to the archive root whatever baseUrl says', () => {
    const source = buildSource({ name: 'librivox', type: 'archive', baseUrl: 'https://elsewhere.example.com' });

    expect(source?.kind).toBe('archive');
    expect(source?.baseUrl).toBe('https://archive.org');
  });

  it('treats a record without type as a rule-driven source', () => {
    const source = buildSource({ name: 'books', baseUrl: 'https://books.example.com', rules });

    expect(source?.kind).toBe('custom');
    expect(source?.baseUrl).toBe('https://books.example.com');
  });

  it('names the missing selector when rules are incomplete', () => {
    const source = buildSource({
      name: 'books',
      baseUrl: 'https://books.example.com',
      rules: { search: { ...rules.search, titleSelector: undefined }, details: rules.details },
    });

    expect(source).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toContain('rules.search.titleSelector');
  });

  it('rejects a rule-driven source without details rules', () => {
    const source = buildSource({
      name: 'books',
      baseUrl: 'https://books.example.com',
      rules: { search: rules.search },
    });

    expect(source).toBeNull();
    expect(warn.mock.calls[0][0]).toContain('rules.details');
  });

  it('rejects rules given as a list', () => {
    const source = buildSource({ name: 'books', baseUrl: 'https://books.example.com', rules: [] });

    expect(source).toBeNull();
    expect(warn.mock.calls[0][0]).toContain('rules: rules must be an object');
  });

  it('rejects search rules given as a list', () => {
    const source = buildSource({
      name: 'books',
      baseUrl: 'https://books.example.com',
      rules: { search: [], details: rules.details },
    });

    expect(source).toBeNull();
    expect(warn.mock.calls[0][0]).toContain('rules.search: search must be an object');
  });

  it('rejects an unknown type', () => {
    expect(buildSource({ name: 'videos', type: 'youtube' })).toBeNull();
    expect(warn).toHaveBeenCalledWith("Skipping source videos: unknown type 'youtube'");
  });
});
