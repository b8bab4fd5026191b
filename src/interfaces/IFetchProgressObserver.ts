/**
 * Receives advisory progress while the tracked universe is fetched
 */
export interface IFetchProgressObserver {
  /**
   * @param completed - instruments attempted so far (1-based)
   * @param total - size of the tracked universe
   * @param code - instrument just attempted
   * @param fetched - whether that attempt produced a snapshot
   */
  onProgress(completed: number, total: number, code: string, fetched: boolean): void;
}
