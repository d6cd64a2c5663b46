import { AudioItem, Audiobook } from '../dto/audio.dto';
import { SourceKind } from '../dto/source-config.dto';

export interface AudioSource {
  readonly name: string;
  readonly kind: SourceKind;
  /** Base against which relative links from this source are resolved. */
  readonly baseUrl: string;

  /** Lightweight lookup; resolves to an empty list rather than rejecting. */
  search(query: string): Promise<AudioItem[]>;
  /** Full record with chapters, or null when it cannot be resolved. */
  getDetails(item: AudioItem): Promise<Audiobook | null>;
  close(): Promise<void>;
}
