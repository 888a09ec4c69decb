import type { InterestSet } from "@rantekoll/core";

/**
 * Persistence collaborator of the crawler service
 */
export interface Store {
  /** Insert, or replace the record with the same natural key */
  upsertInterestSet(set: InterestSet): Promise<void>;
  getInterestSets(): Promise<InterestSet[]>;
}
