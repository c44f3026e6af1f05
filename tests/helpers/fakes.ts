import { ChannelClosedError } from '../../src/utils/appError';
import { AlertImageService } from '../../src/services/alertImageService';
import { AlertService } from '../../src/services/alertService';
import { ChangeFeedBridge } from '../../src/services/changeFeedBridge';
import { ConnectionRegistry, type Channel } from '../../src/services/connectionRegistry';
import { MessageRouter } from '../../src/services/messageRouter';
import type { TransportValue } from '../../src/services/serializer';
import { TaskDispatcher } from '../../src/services/taskDispatcher';
import { MemoryDocumentStore } from './memoryStore';

export type Received = { [key: string]: TransportValue };

function isRecord(value: TransportValue): value is Received {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Channel that records what it is sent. Set `failing` to make sends throw.
 */
export class FakeChannel implements Channel {
  readonly sent: TransportValue[] = [];
  failing = false;
  closed = false;
  closeReason: string | undefined;

  constructor(readonly name: string = 'fake') {}

  send(payload: TransportValue): void {
    if (this.failing || this.closed) {
      throw new ChannelClosedError(this.name);
    }
    this.sent.push(payload);
  }

  close(reason?: string): void {
    this.closed = true;
    this.closeReason = reason;
  }

  /** Received envelopes, optionally only those of one type */
  messages(type?: string): Received[] {
    return this.sent.filter(isRecord).filter((message) => type === undefined || message.type === type);
  }

  types(): TransportValue[] {
    return this.messages().map((message) => message.type);
  }
}

export const FIXED_NOW = new Date('2024-05-01T12:00:00.000Z');

/**
 * A clock that advances one second on every read, so creation order is visible in timestamps.
 */
export function steppingClock(start: Date = FIXED_NOW): () => Date {
  let tick = 0;
  return () => new Date(start.getTime() + 1000 * tick++);
}

export function sequentialIds(prefix: string): () => string {
  let next = 1;
  return () => `${prefix}-${next++}`;
}

/**
 * The whole relay wired over an in-memory store.
 */
export function createRelay(options: { snapshotSize?: number; retryDelayMs?: number } = {}) {
  const now = steppingClock();
  const store = new MemoryDocumentStore();
  const alerts = new AlertService({ store, now, generateId: sequentialIds('alert') });
  const alertImages = new AlertImageService({ store, now, generateId: sequentialIds('image') });
  const registry = new ConnectionRegistry({
    snapshotSize: options.snapshotSize ?? 50,
    loadSnapshot: (limit) => alerts.recentAlerts(limit),
    now,
  });
  const dispatcher = new TaskDispatcher({ store, registry, now, generateId: sequentialIds('task') });
  const router = new MessageRouter({ registry, alerts, alertImages, dispatcher, now });
  const bridge = new ChangeFeedBridge({
    store,
    registry,
    dispatcher,
    retryDelayMs: options.retryDelayMs ?? 5,
    maxRetryDelayMs: 20,
    now,
  });

  return { now, store, alerts, alertImages, registry, dispatcher, router, bridge };
}

export type Relay = ReturnType<typeof createRelay>;

export const LOCATION = { lat: 37.7749, lng: -122.4194, altitude: 120 };

export function alertInput(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    alert_type: 'intrusion',
    score: 0.92,
    location: LOCATION,
    drone_id: 'D1',
    description: 'Person detected near the north fence',
    ...overrides,
  };
}

export function taskInput(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    app_id: 'A1',
    drone_id: 'D1',
    task_type: 'object_detection',
    input_data: { frame: 12 },
    ...overrides,
  };
}

export function alertImageInput(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    found: true,
    name: 'suspect-01',
    actual_image: 'aGVsbG8=',
    matched_frame: 'd29ybGQ=',
    location: LOCATION,
    ...overrides,
  };
}
