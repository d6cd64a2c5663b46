import { Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { isRecord } from '../../common/utils/guards';
import { ArchiveSourceAdapter } from './adapters/archive.adapter';
import { AudioSource } from './adapters/audio-source.interface';
import { SourceHttpOptions } from './adapters/http-source.base';
import { RuleDrivenSourceAdapter } from './adapters/rule-driven.adapter';
import { ArchiveSourceConfigDto, CustomSourceConfigDto } from './dto/source-config.dto';

const logger = new Logger('SourceFactory');

function describeErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => `${path}: ${message}`);
    return [...own, ...describeErrors(error.children ?? [], path)];
  });
}

function validateConfig(config: object): string[] {
  return describeErrors(validateSync(config));
}

/**
 * Builds one adapter from a raw config record. A record without `type` is a
 * rule-driven (`custom`) source. Invalid records are logged and yield null.
 */
export function buildSource(config: unknown, options: SourceHttpOptions = {}): AudioSource | null {
  if (!isRecord(config)) {
    logger.warn('Skipping source entry: expected a mapping');
    return null;
  }

  const label = typeof config.name === 'string' && config.name ? config.name : '<unnamed>';
  const type = config.type ?? 'custom';

  if (type === 'archive') {
    const dto = plainToInstance(ArchiveSourceConfigDto, config);
    const problems = validateConfig(dto);
    if (problems.length) {
      logger.warn(`Skipping archive source ${label}: ${problems.join('; ')}`);
      return null;
    }
    return new ArchiveSourceAdapter(dto.name, dto.collection, options);
  }

  if (type === 'custom') {
    const dto = plainToInstance(CustomSourceConfigDto, config);
    const problems = validateConfig(dto);
    if (problems.length) {
      logger.warn(`Skipping source ${label}: ${problems.join('; ')}`);
      return null;
    }
    return new RuleDrivenSourceAdapter(dto.name, dto.baseUrl, dto.rules, options);
  }

  logger.warn(`Skipping source ${label}: unknown type '${String(type)}'`);
  return null;
}

export function buildAllSources(configs: readonly unknown[], options: SourceHttpOptions = {}): AudioSource[] {
  const sources: AudioSource[] = [];
  const names = new Set<string>();

  for (const config of configs) {
    if (isRecord(config) && typeof config.name === 'string' && names.has(config.name)) {
      logger.warn(`Skipping source ${config.name}: the name is already registered`);
      continue;
    }
    const source = buildSource(config, options);
    if (!source) continue;
    names.add(source.name);
    sources.push(source);
  }
  return sources;
}
