import { describe, it, expect, beforeEach, vi } from 'vitest';
import { NO_DRONE } from '../../src/types/schemas';
import {
  alertImageInput,
  alertInput,
  createRelay,
  FakeChannel,
  taskInput,
  type Relay,
} from '../helpers/fakes';

describe('MessageRouter', () => {
  let relay: Relay;
  let drone: FakeChannel;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    relay = createRelay();
    drone = new FakeChannel('D1');
    await relay.registry.register('drone', 'D1', drone);
  });

  describe('envelopes', () => {
    it('answers ping with pong', async () => {
      const reply = await relay.router.handle('application', 'A1', { type: 'ping' });
      expect(reply).toMatchObject({ type: 'pong' });
    });

    it('accepts envelopes sent as JSON text', async () => {
      const reply = await relay.router.handle('drone', 'D1', '{"type":"ping"}');
      expect(reply?.type).toBe('pong');
    });

    it('reports text that is not JSON', async () => {
      const reply = await relay.router.handle('drone', 'D1', '{not json');
      expect(reply).toMatchObject({
        type: 'error',
        code: 'invalid_message',
        message: 'Invalid envelope: message is not valid JSON',
        ref: null,
      });
    });

    it('reports an envelope without a type', async () => {
      const reply = await relay.router.handle('drone', 'D1', { data: {} });
      expect(reply).toMatchObject({ type: 'error', code: 'invalid_message', ref: null });
      expect(reply?.message).toMatch(/^Invalid envelope: type: /);
    });

    it('rejects a type the role may not send', async () => {
      const reply = await relay.router.handle('drone', 'D1', { type: 'response', alert_id: 'a-1' });
      expect(reply).toMatchObject({
        type: 'error',
        code: 'invalid_message',
        message: "Message type 'response' is not accepted from drone clients",
        ref: 'response',
      });
    });

    it('hides unexpected failures behind internal_error', async () => {
      vi.spyOn(relay.alerts, 'createAlert').mockRejectedValueOnce(new Error('socket hang up'));

      const reply = await relay.router.handle('drone', 'D1', { type: 'alert', data: alertInput() });

      expect(reply).toMatchObject({
        type: 'error',
        code: 'internal_error',
        message: 'Internal server error',
        ref: 'alert',
      });
    });
  });

  describe('drone messages', () => {
    it('stores an alert under the sending drone', async () => {
      const reply = await relay.router.handle('drone', 'D9', {
        type: 'alert',
        data: alertInput({ drone_id: 'spoofed' }),
      });

      expect(reply).toBeNull();
      expect(relay.store.all('alerts')[0]).toMatchObject({ alert_id: 'alert-1', drone_id: 'D9' });
    });

    it('records an image sent together with the alert', async () => {
      await relay.router.handle('drone', 'D1', {
        type: 'alert',
        data: alertInput({ image_url: 'https://img.example/1.jpg' }),
      });

      expect(relay.store.all('alerts')[0]).toMatchObject({
        image_received: 1,
        image_url: 'https://img.example/1.jpg',
        status: 'pending',
      });
    });

    it('records a separate image message', async () => {
      await relay.router.handle('drone', 'D1', { type: 'alert', data: alertInput() });

      const reply = await relay.router.handle('drone', 'D1', {
        type: 'image',
        data: { alert_id: 'alert-1', image_url: 'https://img.example/2.jpg' },
      });

      expect(reply).toBeNull();
      expect(relay.store.all('alerts')[0]).toMatchObject({ image_received: 1, image_url: 'https://img.example/2.jpg' });
    });

    it('reports an illegal task status transition', async () => {
      await relay.dispatcher.enqueue(taskInput());

      const reply = await relay.router.handle('drone', 'D1', {
        type: 'task_status_update',
        data: { task_id: 'task-1', status: 'completed' },
      });

      expect(reply).toMatchObject({ type: 'error', code: 'illegal_transition', ref: 'task_status_update' });
      expect(relay.store.all('processingTasks')[0].status).toBe('pending');
    });

    it('rejects a result for another drone’s task', async () => {
      await relay.dispatcher.enqueue(taskInput());

      const reply = await relay.router.handle('drone', 'D2', {
        type: 'processing_result',
        data: { task_id: 'task-1', processing_time: 1, success: true },
      });

      expect(reply).toMatchObject({ type: 'error', code: 'conflict', ref: 'processing_result' });
    });

    it('stores alert images under the sending drone', async () => {
      await relay.router.handle('drone', 'D2', { type: 'alert_image', data: alertImageInput() });

      expect(relay.store.all('alertImage')[0]).toMatchObject({ alert_image_id: 'image-1', drone_id: 'D2' });
    });
  });

  describe('application messages', () => {
    beforeEach(async () => {
      await relay.router.handle('drone', 'D1', { type: 'alert', data: alertInput() });
    });

    it('records a response and commands the drone that raised the alert', async () => {
      const reply = await relay.router.handle('application', 'A1', {
        type: 'response',
        alert_id: 'alert-1',
        data: { actions: ['dispatch_guard'], response: 1 },
      });

      expect(reply).toBeNull();
      expect(relay.store.all('alerts')[0]).toMatchObject({ status: 'responded', actions: ['dispatch_guard'] });
      expect(drone.messages('drone_command')).toEqual([
        expect.objectContaining({ alert_id: 'alert-1', actions: ['dispatch_guard'] }),
      ]);
    });

    it('accepts the alert id inside data', async () => {
      await relay.router.handle('application', 'A1', {
        type: 'response',
        data: { alert_id: 'alert-1', actions: ['ack'] },
      });

      expect(relay.store.all('alerts')[0].status).toBe('responded');
    });

    it('does not command the drone again for a repeated response', async () => {
      const message = { type: 'response', alert_id: 'alert-1', data: { actions: ['ack'] } };
      await relay.router.handle('application', 'A1', message);
      const reply = await relay.router.handle('application', 'A1', message);

      expect(reply).toBeNull();
      expect(drone.messages('drone_command')).toHaveLength(1);
    });

    it('reports a conflicting response', async () => {
      await relay.router.handle('application', 'A1', { type: 'response', alert_id: 'alert-1', data: { actions: ['ack'] } });

      const reply = await relay.router.handle('application', 'A1', {
        type: 'response',
        alert_id: 'alert-1',
        data: { actions: ['ignore'] },
      });

      expect(reply).toMatchObject({ type: 'error', code: 'conflict', ref: 'response' });
    });

    it('reports a response without an alert id', async () => {
      const reply = await relay.router.handle('application', 'A1', { type: 'response', data: { actions: ['ack'] } });

      expect(reply).toMatchObject({
        type: 'error',
        code: 'invalid_message',
        message: 'Invalid response message: alert_id: Required',
      });
    });

    it('reports a response for an unknown alert', async () => {
      const reply = await relay.router.handle('application', 'A1', {
        type: 'response',
        alert_id: 'missing',
        data: { actions: ['ack'] },
      });

      expect(reply).toMatchObject({ type: 'error', code: 'not_found', message: 'Could not find alert with ID: missing' });
    });

    it('creates tasks owned by the sending application', async () => {
      await relay.router.handle('application', 'A7', {
        type: 'processing_task',
        data: taskInput({ app_id: 'spoofed', priority: 4 }),
      });

      expect(relay.store.all('processingTasks')[0]).toMatchObject({ app_id: 'A7', priority: 4, status: 'pending' });
      expect(drone.messages('processing_task')).toHaveLength(1);
    });

    it('forwards an alert image to the drone it names', async () => {
      await relay.router.handle('application', 'A1', {
        type: 'alert_image',
        data: alertImageInput({ drone_id: 'D1' }),
      });

      const [forwarded] = drone.messages('alert_image');
      expect(forwarded.from_app).toBe('A1');
      expect(forwarded.alert_image).toMatchObject({ alert_image_id: 'image-1', name: 'suspect-01' });
    });

    it('keeps an alert image without a drone in the store only', async () => {
      await relay.router.handle('application', 'A1', { type: 'alert_image', data: alertImageInput() });

      expect(relay.store.all('alertImage')[0].drone_id).toBe(NO_DRONE);
      expect(drone.messages('alert_image')).toHaveLength(0);
    });
  });
});
