export interface AudioItem {
  title: string;
  sourceName: string;
  url: string;
}

export interface Chapter {
  title: string;
  url: string;
}

export interface Audiobook extends AudioItem {
  author?: string | null;
  description?: string | null;
  coverImageUrl?: string | null;
  chapters: Chapter[];
}

export interface Episode {
  title: string;
  url: string;
  description?: string | null;
  publicationDate?: string | null;
}

// Not produced by any adapter yet; episodic sources should return this shape.
export interface Podcast extends AudioItem {
  author?: string | null;
  description?: string | null;
  coverImageUrl?: string | null;
  episodes: Episode[];
}
