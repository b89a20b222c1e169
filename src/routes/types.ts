import type { BrokerChannel } from '~/lib/broker/types';
import type { StatusStore } from '~/lib/status-store/types';
import type { TaskManager } from '~/lib/task-queue/task-manager';

export interface ApiDependencies {
  taskManager: TaskManager;
  store: StatusStore;
  broker: BrokerChannel;
}
