import { interestSetKey, type InterestSet } from "@rantekoll/core";
import type { Logger } from "../logger.js";
import type { Store } from "./types.js";

export class MemoryStore implements Store {
  private readonly sets = new Map<string, InterestSet>();

  constructor(private readonly logger?: Logger) {}

  async upsertInterestSet(set: InterestSet): Promise<void> {
    const key = interestSetKey(set);
    const existing = this.sets.get(key);
    if (existing && existing.nominal_rate !== set.nominal_rate) {
      this.logger?.debug("replacing interest set", {
        key,
        oldRate: existing.nominal_rate,
        newRate: set.nominal_rate,
      });
    }
    this.sets.set(key, set);
  }

  async getInterestSets(): Promise<InterestSet[]> {
    return [...this.sets.values()];
  }
}
