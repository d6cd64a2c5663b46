import { Logger } from '@nestjs/common';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadSourceConfigs } from './sources.loader';

describe('loadSourceConfigs', () => {
  let dir: string;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sources-'));
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  function write(content: string) {
    const file = join(dir, 'sources.yaml');
    writeFileSync(file, content, 'utf-8');
    return file;
  }

  it('returns the entries under the sources key', () => {
    const file = write(
      ['sources:', '  - name: librivox', '    type: archive', '  - name: books', '    baseUrl: https://books.example.com'].join(
        '\n',
      ),
    );

    expect(loadSourceConfigs(file)).toEqual([
      { name: 'librivox', type: 'archive' },
      { name: 'books', baseUrl: 'https://books.example.com' },
    ]);
  });

  it('returns an empty list when the file is missing', () => {
    expect(loadSourceConfigs(join(dir, 'missing.yaml'))).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('returns an empty list when the YAML does not parse', () => {
    expect(loadSourceConfigs(write('sources: [unclosed'))).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('returns an empty list without a sources list', () => {
    expect(loadSourceConfigs(write('other: 1\n'))).toEqual([]);
    expect(warn).toHaveBeenCalledWith(expect.stringContaining("has no 'sources' list"));
  });
});
