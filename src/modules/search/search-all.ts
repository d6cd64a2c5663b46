import { Logger } from '@nestjs/common';
import { withDeadline } from '../../common/utils/deadline';
import { errorMessage } from '../../common/utils/guards';
import { AudioSource } from '../sources/adapters/audio-source.interface';
import { AudioItem } from '../sources/dto/audio.dto';

const logger = new Logger('SearchAll');

export const DEFAULT_SEARCH_TIMEOUT_MS = 10000;

export interface SourceFailure {
  source: string;
  reason: 'error' | 'timeout';
  message?: string;
}

export interface SearchAllResult {
  items: AudioItem[];
  failures: SourceFailure[];
}

type Outcome =
  | { status: 'fulfilled'; value: unknown }
  | { status: 'rejected'; reason: unknown };

/**
 * Runs `search` on every source at once under a single deadline for the whole
 * fan-out. Whatever has settled by then is kept; sources still running are
 * reported as timed out and never awaited again. Results are grouped by
 * registration order, not completion order.
 */
export async function searchAll(
  sources: readonly AudioSource[],
  query: string,
  options: { timeoutMs?: number } = {},
): Promise<SearchAllResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_SEARCH_TIMEOUT_MS;
  const outcomes: Array<Outcome | undefined> = Array.from({ length: sources.length }, () => undefined);

  const tasks = sources.map(async (source, index) => {
    try {
      outcomes[index] = { status: 'fulfilled', value: await source.search(query) };
    } catch (reason) {
      outcomes[index] = { status: 'rejected', reason };
    }
  });

  await withDeadline(Promise.all(tasks), timeoutMs);

  const items: AudioItem[] = [];
  const failures: SourceFailure[] = [];

  sources.forEach((source, index) => {
    const outcome = outcomes[index];
    if (!outcome) {
      logger.warn(`Source ${source.name} did not respond within ${timeoutMs}ms`);
      failures.push({ source: source.name, reason: 'timeout' });
      return;
    }
    if (outcome.status === 'rejected') {
      const message = errorMessage(outcome.reason);
      logger.warn(`Source ${source.name} failed: ${message}`);
      failures.push({ source: source.name, reason: 'error', message });
      return;
    }
    if (!Array.isArray(outcome.value)) {
      logger.warn(`Source ${source.name} returned no result list`);
      failures.push({ source: source.name, reason: 'error', message: 'invalid result' });
      return;
    }
    items.push(...outcome.value);
  });

  return { items, failures };
}
