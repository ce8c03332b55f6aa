import type { ItemResult } from './item-result';

/**
 * Outcome of a whole batch.
 *
 * `items` follows the order of the input WorkItems, never completion order.
 */
export interface BatchResult {
  items: ItemResult[];
  succeededCount: number;
  failedCount: number;
}
