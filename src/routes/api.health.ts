import { Router } from 'express';
import { getLogger } from '~/lib/log/logger';
import type { ApiDependencies } from './types';

const log = getLogger({ module: 'ApiHealth' });

type DependencyState = 'up' | 'down';

export function healthRouter({ store, broker }: ApiDependencies): Router {
  const router = Router();

  router.get('/health', async (_req, res) => {
    const storeState: DependencyState = (await store.ping()) ? 'up' : 'down';
    const brokerState: DependencyState = broker.isConnected() ? 'up' : 'down';
    const healthy = storeState === 'up' && brokerState === 'up';

    if (!healthy) {
      log.warn({ store: storeState, broker: brokerState }, 'health check failed');
    }

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'unavailable',
      store: storeState,
      broker: brokerState,
    });
  });

  return router;
}
