import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { errorMessage, isRecord } from '../../common/utils/guards';

export interface PlaybackHistory {
  lastSearch: string | null;
  lastSelected: string | null;
  lastAudiobook: string | null;
  lastChapterIndex: number | null;
}

export function emptyHistory(): PlaybackHistory {
  return { lastSearch: null, lastSelected: null, lastAudiobook: null, lastChapterIndex: null };
}

function readRow(row: Record<string, unknown>): PlaybackHistory {
  const text = (value: unknown) => (typeof value === 'string' ? value : null);
  const index = Number(row.last_chapter_index);
  return {
    lastSearch: text(row.last_search),
    lastSelected: text(row.last_selected),
    lastAudiobook: text(row.last_audiobook),
    lastChapterIndex:
      row.last_chapter_index === null || row.last_chapter_index === undefined || !Number.isInteger(index)
        ? null
        : index,
  };
}

/**
 * Holds the playback history for the session. Loaded once on start, written
 * back after every change.
 */
@Injectable()
export class HistoryService implements OnModuleInit {
  private readonly logger = new Logger(HistoryService.name);
  private state: PlaybackHistory = emptyHistory();
  // Saves run one after another so the last change is the last row written.
  private saving: Promise<void> = Promise.resolve();

  constructor(@InjectDataSource() private readonly dataSource: Pick<DataSource, 'query'>) {}

  async onModuleInit() {
    await this.load();
  }

  get(): PlaybackHistory {
    return { ...this.state };
  }

  async load(): Promise<PlaybackHistory> {
    try {
      const rows: unknown = await this.dataSource.query(
        `
        SELECT last_search, last_selected, last_audiobook, last_chapter_index
        FROM playback_history
        WHERE id = 1
        `,
      );
      const row: unknown = Array.isArray(rows) ? rows[0] : undefined;
      this.state = isRecord(row) ? readRow(row) : emptyHistory();
    } catch (error) {
      this.logger.warn(`Could not load playback history: ${errorMessage(error)}`);
      this.state = emptyHistory();
    }
    return this.get();
  }

  async recordSearch(query: string, selected?: string | null): Promise<PlaybackHistory> {
    return this.update(
      selected === undefined ? { lastSearch: query } : { lastSearch: query, lastSelected: selected },
    );
  }

  async recordPlayback(audiobook: string, chapterIndex: number): Promise<PlaybackHistory> {
    return this.update({ lastAudiobook: audiobook, lastChapterIndex: chapterIndex });
  }

  private async update(patch: Partial<PlaybackHistory>): Promise<PlaybackHistory> {
    this.state = { ...this.state, ...patch };
    await this.save();
    return this.get();
  }

  private async save() {
    const snapshot = this.get();
    this.saving = this.saving.then(() => this.write(snapshot));
    await this.saving;
  }

  private async write({ lastSearch, lastSelected, lastAudiobook, lastChapterIndex }: PlaybackHistory) {
    try {
      await this.dataSource.query(
        `
        INSERT INTO playback_history (id, last_search, last_selected, last_audiobook, last_chapter_index, updated_at)
        VALUES (1, $1, $2, $3, $4, NOW())
        ON CONFLICT (id)
        DO UPDATE SET last_search = EXCLUDED.last_search,
                      last_selected = EXCLUDED.last_selected,
                      last_audiobook = EXCLUDED.last_audiobook,
                      last_chapter_index = EXCLUDED.last_chapter_index,
                      updated_at = NOW();
        `,
        [lastSearch, lastSelected, lastAudiobook, lastChapterIndex],
      );
    } catch (error) {
      this.logger.error(`Could not save playback history: ${errorMessage(error)}`);
    }
  }
}
