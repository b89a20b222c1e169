/**
 * Extraction Worker
 *
 * Runs ad-library searches in a separate thread so page fetching and parsing
 * never block the consumer's event loop.
 */

import { parentPort, workerData } from 'worker_threads';
import { z } from 'zod';
import { searchAds } from '../crawl/ad-library';
import { errorMessage } from '../errors';
import { getLogger } from '../log/logger';
import type { ExtractionWorkerData, ExtractionWorkerInMessage, ExtractionWorkerOutMessage } from './types';

const log = getLogger({ module: 'ExtractionWorker' });

if (!parentPort) {
  throw new Error('extraction-worker must be run as a worker thread');
}

const port = parentPort;

const WorkerDataSchema: z.ZodType<ExtractionWorkerData> = z.object({
  baseUrl: z.string().url(),
  timeoutMs: z.number().int().positive(),
});

const config = WorkerDataSchema.parse(workerData);

function send(message: ExtractionWorkerOutMessage): void {
  port.postMessage(message);
}

async function handleSearch(message: Extract<ExtractionWorkerInMessage, { type: 'search' }>): Promise<void> {
  const { requestId, keyword, region, timeoutMs } = message;
  try {
    const ads = await searchAds(keyword, region, { baseUrl: config.baseUrl, timeoutMs });
    send({ type: 'search-result', requestId, ads });
  } catch (error) {
    log.error({ err: error, keyword, region }, 'search failed');
    send({ type: 'search-error', requestId, error: errorMessage(error) });
  }
}

port.on('message', (message: ExtractionWorkerInMessage) => {
  switch (message.type) {
    case 'search':
      void handleSearch(message);
      break;

    case 'shutdown':
      log.info({}, 'shutdown requested');
      send({ type: 'shutdown-complete' });
      process.exit(0);
      break;

    default:
      log.warn({ message }, 'unknown message type');
  }
});

send({ type: 'ready' });
log.info({ baseUrl: config.baseUrl }, 'extraction worker ready');
