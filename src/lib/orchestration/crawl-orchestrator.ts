/**
 * Crawl Orchestrator
 * Discover → Filter → FetchExtract → Aggregate → Persist, once per run
 */

import { CrawlerConfig } from '../../config/crawler.config';
import { ConcurrencyLimiter } from '../concurrency';
import {
  CrawlingStatisticsTracker,
  DuplicateDetector,
  ITEM_CARD_SELECTOR,
  LinkDiscoverer,
  listingPageUrl,
} from '../crawling';
import { DetailExtractor, ExtractionOutcome, PageSource } from '../extraction';
import { createLogger } from '../logger';
import { classifyError, HttpClient, PageFetcher } from '../scraping';
import { CarRecord, CarStore } from '../../modules/cars/car.types';
import { ExistenceFilter } from '../../modules/cars/existence-filter';
import { JsonFileSink, RecordSink, SinkResult, StoreSink } from '../../modules/cars/sinks';
import { CrawlRunResult, PageRange } from './orchestrator.types';

const log = createLogger('Orchestrator');

export interface CrawlOrchestratorOptions {
  pages: PageRange;
  fetcher: PageSource;
  discoverer?: LinkDiscoverer;
  filter: Pick<ExistenceFilter, 'filterNew'>;
  extractor: Pick<DetailExtractor, 'extract'>;
  sinks: RecordSink[];
  now?: () => number;
}

interface PageLinks {
  links: string[];
  fresh: string[];
}

export class CrawlOrchestrator {
  private readonly pages: PageRange;
  private readonly fetcher: PageSource;
  private readonly discoverer: LinkDiscoverer;
  private readonly filter: Pick<ExistenceFilter, 'filterNew'>;
  private readonly extractor: Pick<DetailExtractor, 'extract'>;
  private readonly sinks: RecordSink[];
  private readonly now: () => number;

  constructor(options: CrawlOrchestratorOptions) {
    this.pages = options.pages;
    this.fetcher = options.fetcher;
    this.discoverer = options.discoverer ?? new LinkDiscoverer(ITEM_CARD_SELECTOR);
    this.filter = options.filter;
    this.extractor = options.extractor;
    this.sinks = options.sinks;
    this.now = options.now ?? Date.now;
  }

  async run(): Promise<CrawlRunResult> {
    const stats = new CrawlingStatisticsTracker(this.now);
    const { startPage, maxPages } = this.pages;

    log.info(`Crawl started: pages ${startPage}..${startPage + maxPages - 1}`);

    // Discover + Filter, all pages at once
    const pageNumbers = Array.from({ length: maxPages }, (_, i) => startPage + i);
    const perPage = await Promise.all(pageNumbers.map((page) => this.discoverPage(page, stats)));

    // In-run dedup, in page order
    const detector = new DuplicateDetector();
    const candidates: string[] = [];
    for (const { links, fresh } of perPage) {
      const uniqueOnPage = new Set(links).size;
      stats.recordAlreadyStored(uniqueOnPage - fresh.length);
      stats.recordDuplicates(links.length - uniqueOnPage);

      candidates.push(...detector.partition(fresh).fresh);
    }
    stats.recordDuplicates(detector.getStats().duplicates);

    log.info(`${candidates.length} new candidate(s) to extract`);

    // FetchExtract; the limiter inside the fetcher bounds in-flight requests
    const outcomes = await Promise.all(
      candidates.map((url) => {
        stats.recordExtractionAttempt();
        return this.extractSafely(url);
      })
    );

    const records = this.aggregate(outcomes, stats);
    const sinks = await this.persist(records);
    const statistics = stats.getStatistics();

    log.info(
      `Crawl finished in ${statistics.totalTime}ms: ${records.length} extracted, ` +
        `${statistics.alreadyStored} already stored, ${statistics.parseFailures} failed`
    );

    return { records, statistics, sinks };
  }

  private async discoverPage(page: number, stats: CrawlingStatisticsTracker): Promise<PageLinks> {
    const url = listingPageUrl(this.pages.startUrl, page);
    const html = await this.fetcher.fetch(url);

    if (html === null) {
      log.warn(`Listing page ${page} unavailable`);
      stats.recordPageFailed();
      return { links: [], fresh: [] };
    }

    const links = this.discoverer.discover(html, url);
    stats.recordPageVisit(links.length);
    log.debug(`Listing page ${page}: ${links.length} link(s)`);

    return { links, fresh: await this.filter.filterNew(links) };
  }

  private async extractSafely(url: string): Promise<ExtractionOutcome> {
    try {
      return await this.extractor.extract(url);
    } catch (error) {
      const fault = classifyError(error);
      log.error(`Extraction crashed for ${url}: ${fault.type} ${fault.message}`);
      return { status: 'failed', url, error: fault };
    }
  }

  private aggregate(outcomes: ExtractionOutcome[], stats: CrawlingStatisticsTracker): CarRecord[] {
    const records: CarRecord[] = [];

    for (const outcome of outcomes) {
      switch (outcome.status) {
        case 'success':
          stats.recordExtracted();
          records.push(outcome.record);
          break;
        case 'skipped':
          stats.recordSkipped(outcome.reason);
          break;
        case 'failed':
          stats.recordParseFailure();
          break;
      }
    }

    return records;
  }

  private async persist(records: CarRecord[]): Promise<SinkResult[]> {
    const results: SinkResult[] = [];
    for (const sink of this.sinks) {
      results.push(await sink.write(records));
    }
    return results;
  }
}

export interface CrawlOrchestratorDeps {
  httpClient?: HttpClient;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  clock?: () => Date;
}

/**
 * Wire the pipeline from configuration: one limiter shared by every fetch,
 * sinks in persist order (JSON before store).
 */
export function createCrawlOrchestrator(
  config: CrawlerConfig,
  store: CarStore,
  deps: CrawlOrchestratorDeps = {}
): CrawlOrchestrator {
  const { clock } = deps;
  const limiter = new ConcurrencyLimiter(config.maxConcurrentRequests);
  const fetcher = new PageFetcher({
    config: config.fetch,
    limiter,
    httpClient: deps.httpClient,
    sleep: deps.sleep,
    random: deps.random,
  });

  const sinks: RecordSink[] = [];
  if (config.output.saveToJson) {
    sinks.push(
      new JsonFileSink({
        dumpsDir: config.output.dumpsDir,
        indent: config.output.jsonIndent,
        clock,
      })
    );
  }
  if (config.output.saveToDb) {
    sinks.push(new StoreSink(store));
  }

  return new CrawlOrchestrator({
    pages: {
      startUrl: config.startUrl,
      startPage: config.startPage,
      maxPages: config.maxPages,
    },
    fetcher,
    filter: new ExistenceFilter(store),
    extractor: new DetailExtractor({ fetcher, store, clock }),
    sinks,
    now: clock ? () => clock().getTime() : undefined,
  });
}
