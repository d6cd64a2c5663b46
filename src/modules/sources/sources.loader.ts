import { Logger } from '@nestjs/common';
import { readFileSync } from 'fs';
import { load } from 'js-yaml';
import { errorMessage, isRecord } from '../../common/utils/guards';

const logger = new Logger('SourcesLoader');

/**
 * Reads the `sources` list from a YAML file. A missing or unreadable file is
 * an empty list; records are validated later, one by one.
 */
export function loadSourceConfigs(filePath: string): unknown[] {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch (error) {
    logger.warn(`Sources file not readable at '${filePath}': ${errorMessage(error)}`);
    return [];
  }

  try {
    const data: unknown = load(raw);
    if (isRecord(data) && Array.isArray(data.sources)) {
      return data.sources;
    }
    logger.warn(`Sources file '${filePath}' has no 'sources' list`);
  } catch (error) {
    logger.warn(`Could not parse sources file '${filePath}': ${errorMessage(error)}`);
  }
  return [];
}
