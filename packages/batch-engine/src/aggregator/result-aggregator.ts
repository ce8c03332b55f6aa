import type { BatchResult, ItemResult, WorkItem } from '@ocrflow/model';

/**
 * ResultAggregator
 *
 * Collects one terminal ItemResult per WorkItem and produces the BatchResult
 * in WorkItem order, whatever order results arrive in.
 *
 * A missing, duplicate or unknown result is a programming error and throws.
 */
export class ResultAggregator {
  private readonly positions = new Map<string, number>();
  private readonly results: Array<ItemResult | undefined>;

  constructor(private readonly workItems: readonly WorkItem[]) {
    workItems.forEach((item, index) => {
      if (this.positions.has(item.id)) {
        throw new Error(`Duplicate work item id: ${item.id}`);
      }
      this.positions.set(item.id, index);
    });
    this.results = new Array<ItemResult | undefined>(workItems.length).fill(
      undefined,
    );
  }

  /** Number of results recorded so far */
  get recordedCount(): number {
    return this.results.filter((result) => result !== undefined).length;
  }

  has(itemId: string): boolean {
    const position = this.positions.get(itemId);
    return position !== undefined && this.results[position] !== undefined;
  }

  record(result: ItemResult): void {
    const position = this.positions.get(result.id);
    if (position === undefined) {
      throw new Error(`Result for unknown work item: ${result.id}`);
    }
    if (this.results[position] !== undefined) {
      throw new Error(`Duplicate result for work item: ${result.id}`);
    }
    this.results[position] = result;
  }

  finalize(): BatchResult {
    const items: ItemResult[] = [];

    this.results.forEach((result, index) => {
      if (result === undefined) {
        throw new Error(
          `Missing result for work item: ${this.workItems[index].id}`,
        );
      }
      items.push(result);
    });

    const succeededCount = items.filter(
      (item) => item.status === 'succeeded',
    ).length;

    return {
      items,
      succeededCount,
      failedCount: items.length - succeededCount,
    };
  }

  /**
   * One-shot form: record every result and finalize.
   */
  static aggregate(
    workItems: readonly WorkItem[],
    results: Iterable<ItemResult>,
  ): BatchResult {
    const aggregator = new ResultAggregator(workItems);
    for (const result of results) {
      aggregator.record(result);
    }
    return aggregator.finalize();
  }
}
