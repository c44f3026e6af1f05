/**
 * Connection Registry
 * Owns every live client channel, keyed by (role, client id)
 * All sends and broadcasts go through here so that dead channels are evicted in one place
 */

import { ROLES, type OutboundMessage, type Role } from '../types';
import { serialize, type TransportValue } from './serializer';

/**
 * A bidirectional connection to one client.
 * `send` throws when the peer can no longer be reached.
 */
export interface Channel {
  send(payload: TransportValue): void;
  close(reason?: string): void;
}

export interface ConnectionInfo {
  client_id: string;
  role: Role;
  connected_at: string;
}

/** Loads the newest alerts, newest first */
export type SnapshotLoader = (limit: number) => Promise<unknown[]>;

export interface ConnectionRegistryOptions {
  snapshotSize: number;
  loadSnapshot?: SnapshotLoader;
  now?: () => Date;
}

interface ConnectionEntry {
  clientId: string;
  role: Role;
  channel: Channel;
  connectedAt: Date;
}

export class ConnectionRegistry {
  private readonly connections: Record<Role, Map<string, ConnectionEntry>> = {
    drone: new Map(),
    application: new Map(),
  };
  private readonly snapshotSize: number;
  private readonly loadSnapshot?: SnapshotLoader;
  private readonly now: () => Date;

  constructor(options: ConnectionRegistryOptions) {
    this.snapshotSize = options.snapshotSize;
    this.loadSnapshot = options.loadSnapshot;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Register a channel. A previous channel under the same key is evicted and closed.
   * Applications are sent the recent alert snapshot right after registration.
   */
  async register(role: Role, clientId: string, channel: Channel): Promise<void> {
    const pool = this.connections[role];
    const previous = pool.get(clientId);

    if (previous && previous.channel !== channel) {
      console.log(`[Registry] Replacing stale ${role} connection: ${clientId}`);
      pool.delete(clientId);
      this.closeChannel(previous, 'Replaced by a newer connection');
    }

    pool.set(clientId, { clientId, role, channel, connectedAt: this.now() });

    console.log(`[Registry] ${role} registered: ${clientId} (${pool.size} ${role} connections)`);

    if (role === 'application') {
      await this.sendSnapshot(clientId, channel);
    }
  }

  /**
   * Remove a registration. When `channel` is given the entry is only removed if it
   * still holds that channel.
   */
  unregister(role: Role, clientId: string, channel?: Channel): boolean {
    const pool = this.connections[role];
    const entry = pool.get(clientId);
    if (!entry) return false;
    if (channel && entry.channel !== channel) return false;

    pool.delete(clientId);
    console.log(`[Registry] ${role} unregistered: ${clientId}`);
    return true;
  }

  send(role: Role, clientId: string, message: OutboundMessage): boolean {
    const entry = this.connections[role].get(clientId);
    if (!entry) {
      console.warn(`[Registry] ${role} ${clientId} not connected, ${message.type} not delivered`);
      return false;
    }
    return this.deliver(entry, serialize(message));
  }

  /**
   * Send one message to every channel of a role. Returns how many deliveries succeeded.
   */
  broadcast(role: Role, message: OutboundMessage): number {
    const pool = this.connections[role];
    if (pool.size === 0) return 0;

    const payload = serialize(message);
    const targets = [...pool.values()];
    let sent = 0;
    for (const entry of targets) {
      if (this.deliver(entry, payload)) sent++;
    }

    console.log(`[Registry] Broadcasted ${message.type} to ${sent}/${targets.length} ${role} connections`);
    return sent;
  }

  isConnected(role: Role, clientId: string): boolean {
    return this.connections[role].has(clientId);
  }

  stats(): Record<Role, number> {
    return {
      drone: this.connections.drone.size,
      application: this.connections.application.size,
    };
  }

  connectionList(role?: Role): ConnectionInfo[] {
    const roles: readonly Role[] = role ? [role] : ROLES;
    return roles.flatMap((r) =>
      [...this.connections[r].values()].map((entry) => ({
        client_id: entry.clientId,
        role: entry.role,
        connected_at: entry.connectedAt.toISOString(),
      }))
    );
  }

  closeAll(reason: string): void {
    for (const role of ROLES) {
      const entries = [...this.connections[role].values()];
      this.connections[role].clear();
      for (const entry of entries) {
        this.closeChannel(entry, reason);
      }
    }
  }

  private async sendSnapshot(clientId: string, channel: Channel): Promise<void> {
    let alerts: unknown[] = [];
    if (this.loadSnapshot) {
      try {
        alerts = await this.loadSnapshot(this.snapshotSize);
      } catch (error) {
        console.error(`[Registry] Failed to load initial alerts for ${clientId}:`, error);
        return;
      }
    }

    // The client may have reconnected while the snapshot was loading
    const entry = this.connections.application.get(clientId);
    if (!entry || entry.channel !== channel) return;

    this.deliver(
      entry,
      serialize({
        type: 'initial_alerts',
        alerts: alerts.slice(0, this.snapshotSize),
        count: Math.min(alerts.length, this.snapshotSize),
        timestamp: this.now().toISOString(),
      })
    );
  }

  private deliver(entry: ConnectionEntry, payload: TransportValue): boolean {
    try {
      entry.channel.send(payload);
      return true;
    } catch (error) {
      console.error(`[Registry] Send to ${entry.role} ${entry.clientId} failed, evicting:`, error);
      this.unregister(entry.role, entry.clientId, entry.channel);
      this.closeChannel(entry, 'Send failed');
      return false;
    }
  }

  private closeChannel(entry: ConnectionEntry, reason: string): void {
    try {
      entry.channel.close(reason);
    } catch (error) {
      console.warn(`[Registry] Error closing ${entry.role} ${entry.clientId}:`, error);
    }
  }
}
