export interface BookMetadata {
  authors: string[];
  description: string | null;
  thumbnailUrl: string | null;
}

/**
 * Third-party book metadata used to enrich scraped details. Implementations
 * resolve to null for a miss or any failure; they never reject.
 */
export abstract class BookMetadataProvider {
  abstract lookup(title: string, author?: string | null): Promise<BookMetadata | null>;
}
