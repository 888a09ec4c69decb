import type { BankId, InterestSet, RateType } from "@rantekoll/core";
import { Channel } from "./channel.js";
import type { BankCrawler, RateSink } from "./crawlers/types.js";
import type { Logger } from "./logger.js";
import type { Store } from "./store/index.js";

export type CrawlStatus = "ok" | "failed" | "timed_out";

export type CrawlOutcome = {
  bankId: BankId;
  status: CrawlStatus;
  pushed: number;
  durationMs: number;
};

export type InterestSetCount = {
  bank: string;
  type: RateType;
  count: number;
};

export type CrawlSummary = {
  outcomes: CrawlOutcome[];
  counts: InterestSetCount[];
  stored: number;
};

export type CrawlerServiceOptions = {
  crawlerTimeoutMs: number;
};

const DEFAULT_OPTIONS: CrawlerServiceOptions = { crawlerTimeoutMs: 120_000 };

/**
 * Sink handed to one crawler. Once sealed, pushes are dropped instead of
 * reaching the shared channel.
 */
class CrawlerSink implements RateSink {
  pushed = 0;
  private sealed = false;

  constructor(
    private readonly channel: Channel<InterestSet>,
    private readonly logger: Logger
  ) {}

  push(set: InterestSet): void {
    if (this.sealed) {
      this.logger.debug("dropping record pushed after crawler finished", { type: set.type, term: set.term });
      return;
    }
    this.channel.push(set);
    this.pushed++;
  }

  seal(): void {
    this.sealed = true;
  }
}

/**
 * Runs every crawler concurrently and streams their records into the store
 */
export class CrawlerService {
  constructor(
    private readonly store: Store,
    private readonly crawlers: BankCrawler[],
    private readonly logger: Logger,
    private readonly options: CrawlerServiceOptions = DEFAULT_OPTIONS
  ) {}

  async crawl(): Promise<CrawlSummary> {
    const channel = new Channel<InterestSet>();
    const consumer = this.consume(channel);

    const settled = await Promise.allSettled(this.crawlers.map((crawler) => this.runCrawler(crawler, channel)));
    channel.close();
    const stored = await consumer;

    const outcomes = settled.map((result, i): CrawlOutcome => {
      if (result.status === "fulfilled") return result.value;
      this.logger.error("crawler task rejected", result.reason, { bankId: this.crawlers[i].bankId });
      return { bankId: this.crawlers[i].bankId, status: "failed", pushed: 0, durationMs: 0 };
    });

    const counts = countByBankAndType(await this.store.getInterestSets());
    for (const { bank, type, count } of counts) {
      this.logger.info("interest sets stored", { bank, type, count });
    }
    this.logger.info("crawl finished", {
      stored,
      ok: outcomes.filter((o) => o.status === "ok").length,
      failed: outcomes.filter((o) => o.status === "failed").length,
      timedOut: outcomes.filter((o) => o.status === "timed_out").length,
    });

    return { outcomes, counts, stored };
  }

  private async consume(channel: Channel<InterestSet>): Promise<number> {
    let stored = 0;
    for await (const set of channel) {
      try {
        await this.store.upsertInterestSet(set);
        stored++;
      } catch (error) {
        this.logger.error("failed to store interest set", error, { bank: set.bank, type: set.type, term: set.term });
      }
    }
    return stored;
  }

  private async runCrawler(crawler: BankCrawler, channel: Channel<InterestSet>): Promise<CrawlOutcome> {
    const logger = this.logger.child(crawler.bankId);
    const sink = new CrawlerSink(channel, logger);
    const controller = new AbortController();
    const started = Date.now();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<CrawlStatus>((resolve) => {
      timer = setTimeout(() => resolve("timed_out"), this.options.crawlerTimeoutMs);
    });
    const run = Promise.resolve()
      .then(() => crawler.crawl(sink, controller.signal))
      .then(
        (): CrawlStatus => "ok",
        (error: unknown): CrawlStatus => {
          logger.error("crawler failed", error);
          return "failed";
        }
      );

    try {
      const status = await Promise.race([run, timeout]);
      if (status === "timed_out") {
        controller.abort();
        logger.error("crawler timed out", undefined, { timeoutMs: this.options.crawlerTimeoutMs });
      }
      const outcome: CrawlOutcome = {
        bankId: crawler.bankId,
        status,
        pushed: sink.pushed,
        durationMs: Date.now() - started,
      };
      logger.info("crawler finished", { status, pushed: outcome.pushed, durationMs: outcome.durationMs });
      return outcome;
    } finally {
      clearTimeout(timer);
      sink.seal();
    }
  }
}

function countByBankAndType(sets: InterestSet[]): InterestSetCount[] {
  const counts = new Map<string, InterestSetCount>();
  for (const set of sets) {
    const key = `${set.bank}|${set.type}`;
    const entry = counts.get(key);
    if (entry) {
      entry.count++;
    } else {
      counts.set(key, { bank: set.bank, type: set.type, count: 1 });
    }
  }
  return [...counts.values()].sort((a, b) => a.bank.localeCompare(b.bank) || a.type.localeCompare(b.type));
}
