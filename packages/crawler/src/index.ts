import { loadConfig, type Config } from "./config.js";
import { createAllCrawlers, type BankCrawler } from "./crawlers/index.js";
import { createLogger, type Logger } from "./logger.js";
import { CrawlerService, type CrawlSummary } from "./service.js";
import { JsonFileStore } from "./store/index.js";
import { NodeHttpClient } from "./utils/index.js";

export { loadConfig, type Config } from "./config.js";
export * from "./crawlers/index.js";
export * from "./errors.js";
export { createLogger, silentLogger, type Logger, type LogContext, type LogLevel } from "./logger.js";
export * from "./normalize/index.js";
export * from "./payload/index.js";
export * from "./pdf/index.js";
export * from "./spreadsheet/index.js";
export {
  CrawlerService,
  type CrawlerServiceOptions,
  type CrawlOutcome,
  type CrawlStatus,
  type CrawlSummary,
  type InterestSetCount,
} from "./service.js";
export { JsonFileStore, MemoryStore, type Store } from "./store/index.js";
export * from "./table/index.js";
export { NodeHttpClient, type HttpClient, type RequestOptions } from "./utils/index.js";

/**
 * Crawlers selected by the config; all of them when none are named
 */
export function selectCrawlers(all: BankCrawler[], config: Pick<Config, "crawlers">): BankCrawler[] {
  if (config.crawlers.length === 0) return all;
  return all.filter((crawler) => config.crawlers.includes(crawler.bankId));
}

/**
 * One full crawl: every selected crawler runs, the results are merged into
 * the dataset at the configured path and written back.
 */
export async function runCrawl(config: Config, logger: Logger): Promise<CrawlSummary> {
  const http = new NodeHttpClient({ timeoutMs: config.httpTimeoutMs, retries: config.httpRetries, logger });
  const store = await JsonFileStore.open(config.outputPath, logger);
  const crawlers = selectCrawlers(createAllCrawlers({ http, logger }), config);
  logger.info("starting crawl", { crawlers: crawlers.map((c) => c.bankId) });

  const summary = await new CrawlerService(store, crawlers, logger, {
    crawlerTimeoutMs: config.crawlerTimeoutMs,
  }).crawl();
  await store.flush(new Date());
  return summary;
}

export async function main(env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const config = loadConfig(env);
  const logger = createLogger({ level: config.logLevel, name: "crawler" });
  await runCrawl(config, logger);
}
