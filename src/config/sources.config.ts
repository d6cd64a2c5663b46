import { registerAs } from '@nestjs/config';
import { loadSourceConfigs } from '../modules/sources/sources.loader';

export default registerAs('sources', () => ({
  entries: loadSourceConfigs(process.env.SOURCES_FILE || 'sources.yaml'),
}));
