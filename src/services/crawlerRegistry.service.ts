import { UnknownCrawlerTypeError } from '../errors/http-error';
import type { Crawler, CrawlerDescriptor } from '../types/crawl';
import { logger } from '../utils/logger';

export class CrawlerRegistry {
  private readonly crawlers = new Map<string, Crawler>();

  /** Binds `name` to `crawler`. Registering a name again replaces the binding. */
  register(name: string, crawler: Crawler): this {
    const key = name.trim();
    if (!key) {
      throw new Error('Crawler name must not be empty');
    }

    if (this.crawlers.has(key)) {
      logger.warn('Replacing registered crawler', { name: key });
    }
    this.crawlers.set(key, crawler);
    return this;
  }

  resolve(name: string): Crawler {
    const crawler = this.crawlers.get(name);
    if (!crawler) {
      throw new UnknownCrawlerTypeError(name, this.list());
    }
    return crawler;
  }

  has(name: string): boolean {
    return this.crawlers.has(name);
  }

  list(): string[] {
    return Array.from(this.crawlers.keys()).sort();
  }

  describe(): CrawlerDescriptor[] {
    return this.list().map((name) => ({
      name,
      description: this.crawlers.get(name)?.description ?? null,
    }));
  }
}
