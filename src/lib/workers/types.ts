/**
 * Worker Thread Message Types
 *
 * Shared type definitions for communication between the main thread and the
 * extraction worker.
 */

import type { AdRecord } from '~/lib/crawl/ad-library';

/** Passed as workerData when the thread starts */
export interface ExtractionWorkerData {
  baseUrl: string;
  timeoutMs: number;
}

/** Messages sent TO the extraction worker */
export type ExtractionWorkerInMessage =
  | { type: 'search'; requestId: number; keyword: string; region: string; timeoutMs: number }
  | { type: 'shutdown' };

/** Messages sent FROM the extraction worker */
export type ExtractionWorkerOutMessage =
  | { type: 'ready' }
  | { type: 'search-result'; requestId: number; ads: AdRecord[] }
  | { type: 'search-error'; requestId: number; error: string }
  | { type: 'shutdown-complete' };
