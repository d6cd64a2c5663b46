import { registerAs } from '@nestjs/config';

export default registerAs('app', () => ({
  port: parseInt(process.env.PORT ?? '4000', 10),
  searchTimeoutMs: parseInt(process.env.SEARCH_TIMEOUT_MS ?? '10000', 10),
  metadataTimeoutMs: parseInt(process.env.METADATA_TIMEOUT_MS ?? '5000', 10),
  sourceRequestTimeoutMs: parseInt(process.env.SOURCE_REQUEST_TIMEOUT_MS ?? '10000', 10),
}));
