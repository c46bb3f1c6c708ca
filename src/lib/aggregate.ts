import { ProductRecord } from "../types";

export type OfferResult = "inserted" | "duplicate";

/**
 * Output collection keyed by record identifier. The first record to arrive for a
 * key is kept; later ones are dropped.
 */
export class ProductAggregator {
  private readonly records = new Map<string, ProductRecord>();

  offer(record: ProductRecord): OfferResult {
    if (this.records.has(record.identifier)) {
      return "duplicate";
    }
    this.records.set(record.identifier, record);
    return "inserted";
  }

  get size(): number {
    return this.records.size;
  }

  /** Records in arrival order. */
  toArray(): ProductRecord[] {
    return [...this.records.values()];
  }
}
