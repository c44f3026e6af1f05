import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ClientSession } from '../../src/services/clientSession';
import type { Role } from '../../src/types';
import { alertInput, createRelay, FakeChannel, taskInput, type Relay } from '../helpers/fakes';

describe('ClientSession', () => {
  let relay: Relay;

  function connect(role: Role, clientId: string, channel: FakeChannel = new FakeChannel(clientId)) {
    const session = new ClientSession({
      role,
      clientId,
      channel,
      registry: relay.registry,
      router: relay.router,
      dispatcher: relay.dispatcher,
      now: relay.now,
    });
    return { session, channel };
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    relay = createRelay();
  });

  afterEach(async () => {
    await relay.bridge.stop();
  });

  describe('open', () => {
    it('greets an application before sending the alert snapshot', async () => {
      await relay.alerts.createAlert(alertInput());
      const { session, channel } = connect('application', 'A1');

      await session.open();

      expect(channel.types()).toEqual(['connection_established', 'initial_alerts']);
      expect(channel.messages('connection_established')[0]).toMatchObject({
        client_id: 'A1',
        client_type: 'application',
      });
      expect(channel.messages('initial_alerts')[0].count).toBe(1);
    });

    it('sends a reconnecting drone its pending tasks, most urgent first', async () => {
      await relay.dispatcher.enqueue(taskInput({ task_id: 'low', priority: 1 }));
      await relay.dispatcher.enqueue(taskInput({ task_id: 'urgent', priority: 5 }));
      await relay.dispatcher.enqueue(taskInput({ task_id: 'normal' }));
      const { session, channel } = connect('drone', 'D1');

      await session.open();

      expect(channel.types()).toEqual(['connection_established', 'processing_task', 'processing_task', 'processing_task']);
      expect(channel.messages('processing_task').map((message) => message.task_id)).toEqual([
        'urgent',
        'normal',
        'low',
      ]);
    });

    it('sends pending tasks again on a new connection', async () => {
      const first = connect('drone', 'D1');
      await first.session.open();
      await relay.dispatcher.enqueue(taskInput());
      first.session.close();

      const second = connect('drone', 'D1');
      await second.session.open();

      expect(first.channel.messages('processing_task')).toHaveLength(1);
      expect(second.channel.messages('processing_task').map((message) => message.task_id)).toEqual(['task-1']);
    });
  });

  describe('receive', () => {
    it('replies to the sender', async () => {
      const { session, channel } = connect('drone', 'D1');
      await session.open();

      await session.receive({ type: 'ping' });

      expect(channel.types()).toEqual(['connection_established', 'pong']);
    });

    it('handles messages one at a time in arrival order', async () => {
      const { session } = connect('drone', 'D1');
      await session.open();

      const first = session.receive({ type: 'alert', data: alertInput({ alert_id: 'first' }) });
      const second = session.receive({ type: 'alert', data: alertInput({ alert_id: 'second' }) });
      await Promise.all([first, second]);

      const stored = relay.store.all('alerts').map((alert) => alert.alert_id);
      expect(stored).toEqual(['first', 'second']);
    });

    it('keeps going after a message fails', async () => {
      const { session, channel } = connect('drone', 'D1');
      await session.open();

      await session.receive('{broken');
      await session.receive({ type: 'ping' });

      expect(channel.types()).toEqual(['connection_established', 'error', 'pong']);
    });

    it('ignores messages after close', async () => {
      const { session, channel } = connect('drone', 'D1');
      await session.open();
      session.close();

      await session.receive({ type: 'ping' });

      expect(channel.types()).toEqual(['connection_established']);
    });
  });

  describe('close', () => {
    it('unregisters the client', async () => {
      const { session } = connect('application', 'A1');
      await session.open();

      session.close();

      expect(relay.registry.isConnected('application', 'A1')).toBe(false);
    });

    it('leaves a newer connection of the same client in place', async () => {
      const old = connect('drone', 'D1');
      await old.session.open();
      const replacement = connect('drone', 'D1');
      await replacement.session.open();

      old.session.close();

      expect(old.channel.closeReason).toBe('Replaced by a newer connection');
      expect(relay.registry.isConnected('drone', 'D1')).toBe(true);
      await relay.dispatcher.enqueue(taskInput());
      expect(replacement.channel.messages('processing_task')).toHaveLength(1);
    });
  });

  it('relays an alert, its response and a processing task between a drone and an application', async () => {
    relay.bridge.start();
    const drone = connect('drone', 'D1');
    const app = connect('application', 'A1');
    await drone.session.open();
    await app.session.open();

    await drone.session.receive({ type: 'alert', data: alertInput() });
    await vi.waitFor(() => expect(app.channel.messages('new_alert')).toHaveLength(1));
    expect(app.channel.messages('new_alert')[0].alert_id).toBe('alert-1');

    await app.session.receive({ type: 'response', alert_id: 'alert-1', data: { actions: ['dispatch_guard'] } });
    expect(drone.channel.messages('drone_command')).toEqual([
      expect.objectContaining({ alert_id: 'alert-1', actions: ['dispatch_guard'] }),
    ]);
    await vi.waitFor(() => expect(app.channel.messages('alert_update')).toHaveLength(1));
    expect(app.channel.messages('alert_update')[0].updated_fields).toMatchObject({ status: 'responded' });

    await app.session.receive({ type: 'processing_task', data: taskInput({ priority: 5 }) });
    expect(drone.channel.messages('processing_task').map((message) => message.task_id)).toEqual(['task-1']);

    await drone.session.receive({
      type: 'task_status_update',
      data: { task_id: 'task-1', status: 'processing' },
    });
    expect(app.channel.messages('task_status_update')[0]).toMatchObject({ task_id: 'task-1', status: 'processing' });

    await drone.session.receive({
      type: 'processing_result',
      data: { task_id: 'task-1', result_data: { objects: 3 }, processing_time: 2.5, success: true },
    });
    expect(app.channel.messages('processing_result_received')).toEqual([
      expect.objectContaining({ task_id: 'task-1', status: 'completed', drone_id: 'D1', app_id: 'A1' }),
    ]);

    // The result insert reaches the feed after the alert update; a later alert proves it has been handled
    await drone.session.receive({ type: 'alert', data: alertInput() });
    await vi.waitFor(() => expect(app.channel.messages('new_alert')).toHaveLength(2));
    expect(app.channel.messages('processing_result_received')).toHaveLength(1);
    expect(drone.channel.messages('processing_task')).toHaveLength(1);
  });
});
