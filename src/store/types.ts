/**
 * Time-Series Source Contract
 *
 * What detection needs from the cost store. Each detector opens its own
 * session and closes it when done; sessions share nothing.
 */

export type EntityGrouping = 'service';

export interface TimeSeriesSession {
  /** Daily totals per entity, oldest first. */
  queryDailyCosts(grouping: EntityGrouping, windowDays: number): Promise<Map<string, number[]>>;
  /**
   * Latest snapshot per resource with waste_score above the minimum.
   * Records are returned unvalidated; callers parse them.
   */
  queryResourceSnapshots(minWasteScore: number, windowHours: number): Promise<unknown[]>;
  close(): void;
}

export interface TimeSeriesSource {
  open(): Promise<TimeSeriesSession>;
}

/** Raised when the store cannot be reached or a query cannot run. */
export class TimeSeriesUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'TimeSeriesUnavailableError';
  }
}
