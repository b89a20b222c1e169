/**
 * Extraction Worker Client
 *
 * Main thread interface to the extraction worker. Requests are correlated by
 * id; each one rejects on its own timeout, and every pending request rejects
 * if the thread dies. A crashed thread is started again on the next search.
 */

import { Worker } from 'worker_threads';
import path from 'path';
import { fileURLToPath } from 'url';
import type { AdRecord } from '~/lib/crawl/ad-library';
import type { EngineSearchOptions, ExtractionEngine } from '~/lib/crawl/engine';
import { getLogger } from '~/lib/log/logger';
import type { ExtractionWorkerData, ExtractionWorkerInMessage, ExtractionWorkerOutMessage } from './types';

const log = getLogger({ module: 'ExtractionClient' });

const STARTUP_TIMEOUT_MS = 30_000;
const SHUTDOWN_TIMEOUT_MS = 10_000;

interface PendingSearch {
  resolve: (ads: AdRecord[]) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export class ThreadExtractionEngine implements ExtractionEngine {
  private worker: Worker | null = null;
  private starting: Promise<Worker> | null = null;
  private isShuttingDown = false;
  private nextRequestId = 1;
  private readonly pending = new Map<number, PendingSearch>();

  constructor(private readonly config: ExtractionWorkerData) {}

  /**
   * Start the worker thread (idempotent)
   */
  start(): Promise<Worker> {
    if (this.worker) return Promise.resolve(this.worker);
    if (this.starting) return this.starting;

    this.starting = new Promise<Worker>((resolve, reject) => {
      const __dirname = path.dirname(fileURLToPath(import.meta.url));
      const workerPath = path.resolve(__dirname, 'extraction-worker.mjs');

      log.info({}, 'starting extraction worker');

      // The .mjs entry loads the TypeScript worker itself; no loader flags from the parent
      const worker = new Worker(workerPath, {
        execArgv: [],
        workerData: this.config,
      });

      const timeout = setTimeout(() => {
        reject(new Error('Extraction worker startup timeout'));
        void worker.terminate();
      }, STARTUP_TIMEOUT_MS);

      worker.on('message', (message: ExtractionWorkerOutMessage) => {
        if (message.type === 'ready') {
          clearTimeout(timeout);
          this.worker = worker;
          log.info({}, 'extraction worker ready');
          resolve(worker);
          return;
        }
        this.handleWorkerMessage(message);
      });

      worker.on('error', (error) => {
        log.error({ err: error }, 'extraction worker error');
        clearTimeout(timeout);
        reject(error);
      });

      worker.on('exit', (code) => {
        clearTimeout(timeout);
        this.handleWorkerExit(worker, code);
      });
    }).finally(() => {
      this.starting = null;
    });

    return this.starting;
  }

  async search(keyword: string, region: string, options: EngineSearchOptions = {}): Promise<AdRecord[]> {
    const worker = await this.start();
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const requestId = this.nextRequestId++;

    return new Promise<AdRecord[]>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new Error(`Extraction timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      this.pending.set(requestId, { resolve, reject, timer });
      this.send(worker, { type: 'search', requestId, keyword, region, timeoutMs });
    });
  }

  /**
   * Stop the worker thread
   */
  async close(): Promise<void> {
    const worker = this.worker;
    if (!worker || this.isShuttingDown) return;

    this.isShuttingDown = true;
    log.info({}, 'stopping extraction worker');

    await new Promise<void>((resolve) => {
      const timeout = setTimeout(() => {
        log.warn({}, 'extraction worker shutdown timeout, forcing termination');
        void worker.terminate();
        resolve();
      }, SHUTDOWN_TIMEOUT_MS);

      worker.once('exit', () => {
        clearTimeout(timeout);
        resolve();
      });

      this.send(worker, { type: 'shutdown' });
    });

    this.isShuttingDown = false;
  }

  private send(worker: Worker, message: ExtractionWorkerInMessage): void {
    worker.postMessage(message);
  }

  private handleWorkerMessage(message: ExtractionWorkerOutMessage): void {
    switch (message.type) {
      case 'search-result':
      case 'search-error': {
        const request = this.pending.get(message.requestId);
        if (!request) {
          log.warn({ requestId: message.requestId }, 'reply for unknown or timed out request');
          return;
        }
        clearTimeout(request.timer);
        this.pending.delete(message.requestId);
        if (message.type === 'search-result') {
          request.resolve(message.ads);
        } else {
          request.reject(new Error(message.error));
        }
        break;
      }

      case 'shutdown-complete':
        log.info({}, 'extraction worker shutdown complete');
        break;

      default:
        log.warn({ message }, 'unknown message from extraction worker');
    }
  }

  private handleWorkerExit(worker: Worker, code: number): void {
    log.info({ code }, 'extraction worker exited');
    if (this.worker === worker) {
      this.worker = null;
    }

    for (const [requestId, request] of this.pending) {
      clearTimeout(request.timer);
      request.reject(new Error(`Extraction worker exited with code ${code}`));
      this.pending.delete(requestId);
    }

    if (!this.isShuttingDown && code !== 0) {
      log.warn({}, 'extraction worker crashed, it will restart on the next search');
    }
  }
}
