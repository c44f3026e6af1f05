/**
 * Change-Feed Bridge
 * Tails the document store's change feed and turns committed writes into
 * messages for connected clients. Reopens the feed with backoff when it fails.
 */

import type { ConnectionRegistry } from './connectionRegistry';
import type { ChangeEvent, ChangeFeed, DocumentStore, StoreDocument } from './documentStore';
import type { TaskDispatcher } from './taskDispatcher';

export interface ChangeFeedBridgeOptions {
  store: DocumentStore;
  registry: ConnectionRegistry;
  dispatcher: TaskDispatcher;
  retryDelayMs?: number;
  maxRetryDelayMs?: number;
  now?: () => Date;
}

function keyOf(document: StoreDocument | undefined, field: string): unknown {
  return document ? document[field] : undefined;
}

export class ChangeFeedBridge {
  private readonly store: DocumentStore;
  private readonly registry: ConnectionRegistry;
  private readonly dispatcher: TaskDispatcher;
  private readonly retryDelayMs: number;
  private readonly maxRetryDelayMs: number;
  private readonly now: () => Date;

  private feed: ChangeFeed | null = null;
  private loop: Promise<void> | null = null;
  private running: boolean = false;
  private attempts: number = 0;
  private backoffTimer: NodeJS.Timeout | null = null;
  private wakeUp: (() => void) | null = null;

  constructor(options: ChangeFeedBridgeOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.dispatcher = options.dispatcher;
    this.retryDelayMs = options.retryDelayMs ?? 3000;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? 30000;
    this.now = options.now ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.attempts = 0;
    this.loop = this.run();
    console.log('✓ Change feed bridge started');
  }

  /**
   * Stop tailing: cancels a pending reconnect wait, closes the open feed and
   * waits for the loop to finish.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    if (this.backoffTimer) {
      clearTimeout(this.backoffTimer);
      this.backoffTimer = null;
    }
    this.wakeUp?.();

    await this.closeFeed();
    await this.loop;
    this.loop = null;
    console.log('[ChangeFeed] Bridge stopped');
  }

  /** Delay before the next reopen attempt */
  nextDelay(attempt: number): number {
    return Math.min(this.retryDelayMs * 2 ** attempt, this.maxRetryDelayMs);
  }

  private async run(): Promise<void> {
    while (this.running) {
      try {
        this.feed = this.store.watch();
        console.log('[ChangeFeed] Watching alerts, alertImage, processingTasks, processingResults');

        for await (const event of this.feed) {
          if (!this.running) break;
          this.attempts = 0;
          await this.handle(event);
        }

        if (this.running) {
          console.warn('[ChangeFeed] Feed ended unexpectedly');
        }
      } catch (error) {
        if (this.running) {
          console.error('[ChangeFeed] Feed failed:', error);
        }
      } finally {
        await this.closeFeed();
      }

      if (!this.running) break;

      const delay = this.nextDelay(this.attempts);
      this.attempts++;
      console.log(`[ChangeFeed] Reopening feed in ${delay}ms (attempt ${this.attempts})`);
      await this.wait(delay);
    }
  }

  /**
   * Route one committed write. Failures are logged and the event is dropped.
   */
  async handle(event: ChangeEvent): Promise<void> {
    try {
      switch (event.collection) {
        case 'alerts':
          this.handleAlert(event);
          break;
        case 'processingTasks':
          if (event.operation === 'insert' && event.fullDocument) {
            await this.dispatcher.handleTaskInserted(event.fullDocument);
          }
          break;
        case 'processingResults':
          if (event.operation === 'insert' && event.fullDocument) {
            await this.dispatcher.handleResultInserted(event.fullDocument);
          }
          break;
        case 'alertImage':
          if (event.operation === 'insert' && event.fullDocument) {
            this.registry.broadcast('application', {
              type: 'alert_image_received',
              alert_image_id: keyOf(event.fullDocument, 'alert_image_id'),
              alert_image: event.fullDocument,
              drone_id: keyOf(event.fullDocument, 'drone_id'),
              timestamp: this.now().toISOString(),
            });
          }
          break;
      }
    } catch (error) {
      console.error(`[ChangeFeed] Dropped ${event.operation} event on ${event.collection}:`, error);
    }
  }

  private handleAlert(event: ChangeEvent): void {
    const timestamp = this.now().toISOString();

    if (event.operation === 'insert') {
      this.registry.broadcast('application', {
        type: 'new_alert',
        alert: event.fullDocument,
        alert_id: keyOf(event.fullDocument, 'alert_id'),
        timestamp,
      });
      return;
    }

    this.registry.broadcast('application', {
      type: 'alert_update',
      alert_id: keyOf(event.fullDocument, 'alert_id'),
      document_key: event.documentKey,
      updated_fields: event.updatedFields ?? {},
      alert: event.fullDocument,
      timestamp,
    });
  }

  private wait(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wakeUp = () => {
        this.wakeUp = null;
        resolve();
      };
      this.backoffTimer = setTimeout(() => {
        this.backoffTimer = null;
        this.wakeUp?.();
      }, ms);
    });
  }

  private async closeFeed(): Promise<void> {
    const feed = this.feed;
    this.feed = null;
    if (!feed) return;
    try {
      await feed.close();
    } catch (error) {
      console.warn('[ChangeFeed] Error closing feed:', error);
    }
  }
}
