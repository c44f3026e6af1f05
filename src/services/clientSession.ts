/**
 * Client Session
 * Lifecycle of one connected client: greet, register, process inbound
 * messages one at a time, unregister on close.
 */

import type { OutboundMessage, Role } from '../types';
import type { Channel, ConnectionRegistry } from './connectionRegistry';
import type { MessageRouter } from './messageRouter';
import { serialize } from './serializer';
import type { TaskDispatcher } from './taskDispatcher';

export interface ClientSessionOptions {
  role: Role;
  clientId: string;
  channel: Channel;
  registry: ConnectionRegistry;
  router: MessageRouter;
  dispatcher: TaskDispatcher;
  now?: () => Date;
}

export class ClientSession {
  readonly role: Role;
  readonly clientId: string;
  private readonly channel: Channel;
  private readonly registry: ConnectionRegistry;
  private readonly router: MessageRouter;
  private readonly dispatcher: TaskDispatcher;
  private readonly now: () => Date;

  private queue: Promise<void> = Promise.resolve();
  private closed: boolean = false;

  constructor(options: ClientSessionOptions) {
    this.role = options.role;
    this.clientId = options.clientId;
    this.channel = options.channel;
    this.registry = options.registry;
    this.router = options.router;
    this.dispatcher = options.dispatcher;
    this.now = options.now ?? (() => new Date());
  }

  async open(): Promise<void> {
    this.reply({
      type: 'connection_established',
      client_id: this.clientId,
      client_type: this.role,
      timestamp: this.now().toISOString(),
    });

    await this.registry.register(this.role, this.clientId, this.channel);

    if (this.role === 'drone') {
      await this.dispatcher.flushPending(this.clientId);
    }
  }

  /**
   * Queue an inbound message behind the ones already received on this channel.
   */
  receive(raw: unknown): Promise<void> {
    this.queue = this.queue.then(async () => {
      if (this.closed) return;
      const reply = await this.router.handle(this.role, this.clientId, raw);
      if (reply) this.reply(reply);
    });
    return this.queue;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    const removed = this.registry.unregister(this.role, this.clientId, this.channel);
    if (removed && this.role === 'drone') {
      this.dispatcher.releaseDrone(this.clientId);
    }
  }

  private reply(message: OutboundMessage): void {
    try {
      this.channel.send(serialize(message));
    } catch (error) {
      console.warn(`[Session] Could not reply to ${this.role} ${this.clientId}:`, error);
    }
  }
}
