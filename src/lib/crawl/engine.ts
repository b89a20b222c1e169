import type { AdRecord } from './ad-library';

export interface EngineSearchOptions {
  /** Give up after this many milliseconds; the task then fails. */
  timeoutMs?: number;
}

/**
 * Keyword search backend used by the worker loop
 */
export interface ExtractionEngine {
  search(keyword: string, region: string, options?: EngineSearchOptions): Promise<AdRecord[]>;
  close(): Promise<void>;
}
