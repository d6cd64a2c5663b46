import axios, { AxiosInstance } from 'axios';
import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';
import { AudioItem, Audiobook } from '../dto/audio.dto';
import { SourceKind } from '../dto/source-config.dto';
import { AudioSource } from './audio-source.interface';

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export const DEFAULT_REQUEST_TIMEOUT_MS = 10000;

export interface SourceHttpOptions {
  timeoutMs?: number;
  /** Replaces the adapter's own client; the adapter then owns no sockets. */
  client?: AxiosInstance;
}

/**
 * Every adapter owns its own connection pool. Nothing is shared between
 * sources, so closing one never affects another.
 */
export abstract class HttpSourceAdapter implements AudioSource {
  abstract readonly kind: SourceKind;

  protected readonly http: AxiosInstance;
  private readonly agents: HttpAgent[] = [];
  private closed = false;

  protected constructor(
    readonly name: string,
    readonly baseUrl: string,
    options: SourceHttpOptions = {},
  ) {
    if (options.client) {
      this.http = options.client;
      return;
    }

    const httpAgent = new HttpAgent({ keepAlive: true });
    const httpsAgent = new HttpsAgent({ keepAlive: true });
    this.agents.push(httpAgent, httpsAgent);
    this.http = axios.create({
      httpAgent,
      httpsAgent,
      timeout: options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      maxRedirects: 10,
      headers: { 'User-Agent': BROWSER_USER_AGENT },
    });
  }

  abstract search(query: string): Promise<AudioItem[]>;

  abstract getDetails(item: AudioItem): Promise<Audiobook | null>;

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const agent of this.agents) {
      agent.destroy();
    }
  }
}
