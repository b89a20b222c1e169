// Alert fan-out for task outcomes and service errors
// monitoring: in-memory EventEmitter subscribers; chat: Telegram Bot API; log: info line
import { EventEmitter } from 'events';
import { getLogger } from '~/lib/log/logger';

const log = getLogger({ module: 'Notifier' });

export type NotificationChannel = 'monitoring' | 'chat' | 'log';

export interface MonitoringEvent {
  message: string;
  timestamp: string;
}

export interface NotifierOptions {
  telegram?: {
    botToken?: string;
    chatId?: string;
  };
  fetchImpl?: typeof fetch;
  /** Abort a chat delivery after this long (default: 10000). */
  chatTimeoutMs?: number;
}

const TELEGRAM_API = 'https://api.telegram.org';
const DEFAULT_CHAT_TIMEOUT_MS = 10_000;

/**
 * Best-effort notifier: delivery failures are logged, never thrown
 */
export class Notifier extends EventEmitter {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: NotifierOptions = {}) {
    super();
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async notify(channel: NotificationChannel, message: string): Promise<void> {
    switch (channel) {
      case 'monitoring':
        this.sendToMonitoring(message);
        break;
      case 'chat':
        await this.sendToChat(message);
        break;
      case 'log':
        log.info({ alert: message }, 'alert');
        break;
      default:
        log.error({ channel }, 'unsupported notification channel');
    }
  }

  /**
   * Alert every channel for each service whose state starts with "error".
   * A state of the form "error: <reason>" carries its reason into the message.
   */
  async monitorServices(states: Record<string, string>): Promise<void> {
    for (const [service, state] of Object.entries(states)) {
      if (!state.startsWith('error')) continue;

      const separator = state.indexOf(': ');
      const reason = separator >= 0 ? state.slice(separator + 2) : 'unspecified issue';
      const message = `Service ${service} encountered an error: ${reason}.`;

      log.info({ service, reason }, 'sending service alert to all channels');
      await this.notify('chat', message);
      await this.notify('log', message);
      await this.notify('monitoring', message);
    }
  }

  /**
   * Subscribe to monitoring events
   * Returns unsubscribe function
   */
  subscribe(listener: (event: MonitoringEvent) => void): () => void {
    this.on('monitoring', listener);
    return () => {
      this.off('monitoring', listener);
    };
  }

  getSubscriberCount(): number {
    return this.listenerCount('monitoring');
  }

  private sendToMonitoring(message: string): void {
    const event: MonitoringEvent = { message, timestamp: new Date().toISOString() };
    try {
      this.emit('monitoring', event);
    } catch (error) {
      log.error({ err: error }, 'monitoring subscriber failed');
    }
  }

  private async sendToChat(message: string): Promise<void> {
    const botToken = this.options.telegram?.botToken;
    const chatId = this.options.telegram?.chatId;
    if (!botToken || !chatId) {
      log.warn({}, 'telegram bot token or chat id not configured, chat alert skipped');
      return;
    }

    const timeoutMs = this.options.chatTimeoutMs ?? DEFAULT_CHAT_TIMEOUT_MS;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.fetchImpl(`${TELEGRAM_API}/bot${botToken}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ chat_id: chatId, text: message }),
        signal: controller.signal,
      });
      if (!response.ok) {
        log.error({ status: response.status }, 'telegram rejected message');
        return;
      }
      log.debug({ status: response.status }, 'telegram message sent');
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        log.error({ timeoutMs }, 'telegram request timed out');
      } else {
        log.error({ err: error }, 'failed to send telegram message');
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
