import type { AppSettings } from '~/lib/config/settings';
import { AmqpBroker } from './amqp';
import { MemoryBroker } from './memory';
import type { BrokerChannel } from './types';

/**
 * Build the broker channel selected by settings (not yet connected)
 */
export function createBroker(settings: AppSettings['broker']): BrokerChannel {
  switch (settings.driver) {
    case 'amqp':
      return new AmqpBroker({ url: settings.url, prefetch: settings.prefetch });
    case 'memory':
      return new MemoryBroker(settings.prefetch);
  }
}

export type { BrokerChannel, BrokerDelivery, ConsumeOptions } from './types';
export { AmqpBroker } from './amqp';
export { MemoryBroker } from './memory';
