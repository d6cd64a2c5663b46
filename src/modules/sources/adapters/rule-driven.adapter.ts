import { Logger } from '@nestjs/common';
import { errorMessage } from '../../../common/utils/guards';
import { AudioItem, Audiobook, Chapter } from '../dto/audio.dto';
import { SourceRules } from '../dto/source-config.dto';
import { selectAttribute, selectText, withDocument } from '../utils/html';
import { buildUrl, resolveUrl } from '../utils/url';
import { HttpSourceAdapter, SourceHttpOptions } from './http-source.base';

/**
 * Scrapes an HTML site described entirely by CSS selectors and a search URL
 * template, so a new site needs a config entry and no code.
 */
export class RuleDrivenSourceAdapter extends HttpSourceAdapter {
  readonly kind = 'custom';

  private readonly logger: Logger;

  constructor(
    name: string,
    baseUrl: string,
    private readonly rules: SourceRules,
    options?: SourceHttpOptions,
  ) {
    super(name, baseUrl, options);
    this.logger = new Logger(`${RuleDrivenSourceAdapter.name}:${name}`);
  }

  async search(query: string): Promise<AudioItem[]> {
    try {
      const searchUrl = buildUrl(this.rules.search.url, { query }, this.baseUrl);
      this.logger.debug(`Fetching search URL: ${searchUrl}`);
      const html = await this.fetchHtml(searchUrl);
      return withDocument(html, (document) => this.readSearchResults(document));
    } catch (error) {
      this.logger.error(`Search on ${this.name} failed: ${errorMessage(error)}`);
      return [];
    }
  }

  async getDetails(item: AudioItem): Promise<Audiobook | null> {
    this.logger.log(`Fetching details for '${item.title}' at ${item.url}`);
    try {
      const html = await this.fetchHtml(item.url);
      return withDocument(html, (document) => this.readAudiobook(document, item));
    } catch (error) {
      this.logger.error(`Could not fetch details from ${item.url}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async fetchHtml(url: string): Promise<string> {
    const res = await this.http.get<string>(url, { responseType: 'text' });
    return typeof res.data === 'string' ? res.data : String(res.data ?? '');
  }

  private readSearchResults(document: Document): AudioItem[] {
    const rule = this.rules.search;
    const containers = Array.from(document.querySelectorAll(rule.itemContainerSelector));
    this.logger.debug(`Found ${containers.length} potential result containers`);

    const results: AudioItem[] = [];
    for (const container of containers) {
      const titleElement = container.querySelector(rule.titleSelector);
      const href = container.querySelector(rule.urlSelector)?.getAttribute('href');
      // An empty href is a link to the base URL itself.
      if (!titleElement || typeof href !== 'string') {
        this.logger.debug('Result container matched but its title or link selector did not');
        continue;
      }

      results.push({
        title: (titleElement.textContent ?? '').trim(),
        sourceName: this.name,
        url: resolveUrl(href, this.baseUrl),
      });
    }
    return results;
  }

  private readAudiobook(document: Document, item: AudioItem): Audiobook {
    const rule = this.rules.details;
    const containers = Array.from(document.querySelectorAll(rule.chapterContainerSelector));
    this.logger.debug(`Found ${containers.length} chapter containers`);

    // Numbering follows the container position, so a skipped container leaves a gap.
    const chapters: Chapter[] = [];
    containers.forEach((container, index) => {
      const src = container.querySelector(rule.chapterUrlSelector)?.getAttribute('src');
      if (src) {
        chapters.push({ title: `Chapter ${index + 1}`, url: resolveUrl(src, item.url) });
      }
    });

    const cover = selectAttribute(document, rule.coverImageUrlSelector, 'src');

    return {
      title: item.title,
      sourceName: item.sourceName,
      url: item.url,
      author: selectText(document, rule.authorSelector),
      description: selectText(document, rule.descriptionSelector),
      coverImageUrl: cover ? resolveUrl(cover, item.url) : null,
      chapters,
    };
  }
}
