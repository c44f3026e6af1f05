/**
 * Message Router
 * Validates inbound channel envelopes and routes them to the services by
 * (role, type). Failures come back to the sender as `error` envelopes.
 */

import { z } from 'zod';
import AppError, { ValidationError } from '../utils/appError';
import {
  AlertImageUpdateSchema,
  AlertResponseInputSchema,
  EnvelopeSchema,
  NO_DRONE,
  TaskStatusUpdateSchema,
  parseWith,
} from '../types/schemas';
import type { InboundType, OutboundMessage, Role } from '../types';
import type { AlertImageService } from './alertImageService';
import { droneCommand, type AlertService } from './alertService';
import type { ConnectionRegistry } from './connectionRegistry';
import type { TaskDispatcher } from './taskDispatcher';

type Envelope = z.infer<typeof EnvelopeSchema>;

type Handler = (clientId: string, envelope: Envelope) => Promise<OutboundMessage | void>;

export interface MessageRouterOptions {
  registry: ConnectionRegistry;
  alerts: AlertService;
  alertImages: AlertImageService;
  dispatcher: TaskDispatcher;
  now?: () => Date;
}

const dataOf = z.object({ data: z.record(z.unknown()).default({}) });

const ResponseEnvelopeSchema = z.object({
  alert_id: z.string().min(1).optional(),
  data: z.record(z.unknown()).default({}),
});

function payload(envelope: Envelope, type: string): Record<string, unknown> {
  return parseWith(dataOf, envelope, `${type} message`).data;
}

export class MessageRouter {
  private readonly registry: ConnectionRegistry;
  private readonly alerts: AlertService;
  private readonly alertImages: AlertImageService;
  private readonly dispatcher: TaskDispatcher;
  private readonly now: () => Date;
  private readonly handlers: Record<Role, Partial<Record<InboundType, Handler>>>;

  constructor(options: MessageRouterOptions) {
    this.registry = options.registry;
    this.alerts = options.alerts;
    this.alertImages = options.alertImages;
    this.dispatcher = options.dispatcher;
    this.now = options.now ?? (() => new Date());

    this.handlers = {
      drone: {
        alert: (clientId, envelope) => this.onAlert(clientId, envelope),
        image: (clientId, envelope) => this.onImage(envelope),
        processing_result: (clientId, envelope) => this.onProcessingResult(clientId, envelope),
        task_status_update: (clientId, envelope) => this.onTaskStatusUpdate(clientId, envelope),
        alert_image: (clientId, envelope) => this.onAlertImage('drone', clientId, envelope),
        ping: async () => this.pong(),
      },
      application: {
        response: (clientId, envelope) => this.onResponse(envelope),
        processing_task: (clientId, envelope) => this.onProcessingTask(clientId, envelope),
        alert_image: (clientId, envelope) => this.onAlertImage('application', clientId, envelope),
        ping: async () => this.pong(),
      },
    };
  }

  /**
   * Handle one inbound message. Resolves to the reply for the sender, if any;
   * never rejects.
   */
  async handle(role: Role, clientId: string, raw: unknown): Promise<OutboundMessage | null> {
    let type: string | undefined;
    try {
      const envelope = parseWith(EnvelopeSchema, this.decode(raw), 'envelope');
      type = envelope.type;

      const handler = this.lookup(role, envelope.type);
      if (!handler) {
        throw new ValidationError(`Message type '${envelope.type}' is not accepted from ${role} clients`);
      }

      const reply = await handler(clientId, envelope);
      if (reply) return reply;
      return null;
    } catch (error) {
      return this.toError(role, clientId, type, error);
    }
  }

  private lookup(role: Role, type: string): Handler | undefined {
    const table = this.handlers[role];
    for (const [name, handler] of Object.entries(table)) {
      if (name === type) return handler;
    }
    return undefined;
  }

  private decode(raw: unknown): unknown {
    if (typeof raw !== 'string') return raw;
    try {
      const decoded: unknown = JSON.parse(raw);
      return decoded;
    } catch {
      throw new ValidationError('Invalid envelope: message is not valid JSON');
    }
  }

  private async onAlert(droneId: string, envelope: Envelope): Promise<void> {
    const data = payload(envelope, 'alert');
    const alert = await this.alerts.createAlert({ ...data, drone_id: droneId });

    const imageUrl = data.image_url;
    if (typeof imageUrl === 'string' && imageUrl.length > 0) {
      await this.alerts.recordImage(alert.alert_id, imageUrl);
    }
  }

  private async onImage(envelope: Envelope): Promise<void> {
    const data = payload(envelope, 'image');
    const { alert_id } = parseWith(z.object({ alert_id: z.string().min(1) }), data, 'image message');
    const { image_url } = parseWith(AlertImageUpdateSchema, data, 'image message');
    await this.alerts.recordImage(alert_id, image_url);
  }

  private async onProcessingResult(droneId: string, envelope: Envelope): Promise<void> {
    await this.dispatcher.reportResult(droneId, payload(envelope, 'processing_result'));
  }

  private async onTaskStatusUpdate(droneId: string, envelope: Envelope): Promise<void> {
    const update = parseWith(TaskStatusUpdateSchema, payload(envelope, 'task_status_update'), 'task status update');
    await this.dispatcher.updateStatus(update.task_id, update.status, update.additional_data, droneId);
  }

  private async onAlertImage(role: Role, clientId: string, envelope: Envelope): Promise<void> {
    const data = payload(envelope, 'alert_image');
    const image = await this.alertImages.create(role === 'drone' ? { ...data, drone_id: clientId } : data);

    if (role === 'application' && image.drone_id !== NO_DRONE) {
      this.registry.send('drone', image.drone_id, {
        type: 'alert_image',
        alert_image: image,
        from_app: clientId,
        timestamp: this.now().toISOString(),
      });
    }
  }

  private async onResponse(envelope: Envelope): Promise<void> {
    const { alert_id: topLevelId, data } = parseWith(ResponseEnvelopeSchema, envelope, 'response message');
    const alertId = topLevelId ?? data.alert_id;
    if (typeof alertId !== 'string' || alertId.length === 0) {
      throw new ValidationError('Invalid response message: alert_id: Required');
    }

    const { actions, response } = parseWith(AlertResponseInputSchema, data, 'response message');
    const { alert, changed } = await this.alerts.recordResponse(alertId, actions, response);
    if (!changed) return;

    this.registry.send('drone', alert.drone_id, droneCommand(alert, this.now()));
  }

  private async onProcessingTask(appId: string, envelope: Envelope): Promise<void> {
    await this.dispatcher.enqueue({ ...payload(envelope, 'processing_task'), app_id: appId });
  }

  private pong(): OutboundMessage {
    return { type: 'pong', timestamp: this.now().toISOString() };
  }

  private toError(role: Role, clientId: string, ref: string | undefined, error: unknown): OutboundMessage {
    const known = error instanceof AppError;
    const code = known ? error.code : 'internal_error';
    const message = known ? error.message : 'Internal server error';

    if (known) {
      console.warn(`[Router] Rejected ${ref ?? 'message'} from ${role} ${clientId}: ${message}`);
    } else {
      console.error(`[Router] Failed to handle ${ref ?? 'message'} from ${role} ${clientId}:`, error);
    }

    return {
      type: 'error',
      code,
      message,
      ref: ref ?? null,
      timestamp: this.now().toISOString(),
    };
  }
}
