import { mkdir, readFile, writeFile } from "fs/promises";
import { existsSync } from "fs";
import { dirname } from "path";
import { InterestSetsDatasetSchema, type InterestSet, type InterestSetsDataset } from "@rantekoll/core";
import type { Logger } from "../logger.js";
import { MemoryStore } from "./memory.js";
import type { Store } from "./types.js";

/**
 * Keeps records in memory and writes them as one JSON dataset on flush.
 * An existing dataset at the path is loaded first, so history accumulates.
 */
export class JsonFileStore implements Store {
  private readonly memory: MemoryStore;

  private constructor(
    private readonly path: string,
    private readonly logger: Logger
  ) {
    this.memory = new MemoryStore(logger);
  }

  static async open(path: string, logger: Logger): Promise<JsonFileStore> {
    const store = new JsonFileStore(path, logger);
    if (existsSync(path)) {
      const dataset = InterestSetsDatasetSchema.parse(JSON.parse(await readFile(path, "utf-8")));
      for (const set of dataset.interest_sets) {
        await store.memory.upsertInterestSet(set);
      }
      logger.info("loaded dataset", { path, interestSets: dataset.interest_sets.length });
    }
    return store;
  }

  upsertInterestSet(set: InterestSet): Promise<void> {
    return this.memory.upsertInterestSet(set);
  }

  getInterestSets(): Promise<InterestSet[]> {
    return this.memory.getInterestSets();
  }

  async flush(now: Date = new Date()): Promise<InterestSetsDataset> {
    const dataset = InterestSetsDatasetSchema.parse({
      generated_at: now.toISOString(),
      interest_sets: await this.memory.getInterestSets(),
    });
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify(dataset, null, 2) + "\n", "utf-8");
    this.logger.info("wrote dataset", { path: this.path, interestSets: dataset.interest_sets.length });
    return dataset;
  }
}
