/**
 * Alert Service
 * Creates alerts and records application responses and drone images against them
 */

import { randomUUID } from 'node:crypto';
import { ConflictError, NotFoundError, ValidationError } from '../utils/appError';
import { AlertInputSchema, AlertRecordSchema, parseWith } from '../types/schemas';
import type { Alert, OutboundMessage } from '../types';
import { planImage, planResponse, type AlertPlan } from './alertStateMachine';
import { COLLECTIONS, type DocumentStore, type StoreDocument } from './documentStore';

export interface AlertServiceOptions {
  store: DocumentStore;
  now?: () => Date;
  generateId?: () => string;
}

export interface AlertChange {
  alert: Alert;
  changed: boolean;
}

/** Command sent to the drone that raised an alert once an application has responded */
export function droneCommand(alert: Alert, timestamp: Date): OutboundMessage {
  return {
    type: 'drone_command',
    alert_id: alert.alert_id,
    actions: alert.actions,
    timestamp: timestamp.toISOString(),
  };
}

export class AlertService {
  private readonly store: DocumentStore;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: AlertServiceOptions) {
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async createAlert(input: unknown): Promise<Alert> {
    const data = parseWith(AlertInputSchema, input, 'alert');

    const alert: Alert = {
      alert_id: data.alert_id ?? this.generateId(),
      alert_type: data.alert_type,
      score: data.score,
      location: data.location,
      drone_id: data.drone_id,
      created_at: data.timestamp ?? this.now(),
      response: 0,
      image_received: 0,
      status: 'pending',
      actions: [],
      ...(data.description !== undefined ? { description: data.description } : {}),
    };

    await this.store.insert(COLLECTIONS.alerts, { ...alert });
    console.log(`[Alerts] Alert ${alert.alert_id} (${alert.alert_type}) stored for drone ${alert.drone_id}`);
    return alert;
  }

  async getAlert(alertId: string): Promise<Alert> {
    const document = await this.store.findOne(COLLECTIONS.alerts, { alert_id: alertId });
    if (!document) {
      throw new NotFoundError(`Could not find alert with ID: ${alertId}`);
    }
    return parseWith(AlertRecordSchema, document, `stored alert ${alertId}`);
  }

  /** Newest first */
  recentAlerts(limit: number): Promise<StoreDocument[]> {
    return this.store.find(COLLECTIONS.alerts, {}, { sort: { created_at: -1 }, limit });
  }

  async recordResponse(alertId: string, actions: string[], responseFlag: number = 1): Promise<AlertChange> {
    if (responseFlag !== 1) {
      throw new ValidationError(`Invalid response: response flag must be 1, got ${responseFlag}`);
    }
    const alert = await this.getAlert(alertId);
    return this.apply(alert, planResponse(alert, actions));
  }

  async recordImage(alertId: string, imageUrl: string): Promise<AlertChange> {
    const alert = await this.getAlert(alertId);
    return this.apply(alert, planImage(alert, imageUrl));
  }

  private async apply(alert: Alert, plan: AlertPlan): Promise<AlertChange> {
    if (!plan) return { alert, changed: false };

    const applied = await this.store.update(
      COLLECTIONS.alerts,
      alert.alert_id,
      { ...plan.patch },
      { response: alert.response, image_received: alert.image_received }
    );
    if (!applied) {
      throw new ConflictError(`Alert ${alert.alert_id} was modified concurrently, retry the request`);
    }

    console.log(`[Alerts] Alert ${alert.alert_id} is now ${plan.status}`);
    return { alert: { ...alert, ...plan.patch }, changed: true };
  }
}
