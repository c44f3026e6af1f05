import { ConflictError } from '../utils/appError';
import type { Alert, AlertStatus } from '../types';

type AlertState = Pick<Alert, 'alert_id' | 'response' | 'image_received' | 'status' | 'actions' | 'image_url'>;

export type AlertPatch = Partial<Pick<Alert, 'response' | 'image_received' | 'status' | 'actions' | 'image_url'>>;

/** `null` when the message repeats what is already stored */
export type AlertPlan = { patch: AlertPatch; status: AlertStatus } | null;

/**
 * Response and image are independent flags; the status only reaches
 * completed once both have arrived.
 */
export function resolveAlertStatus(response: 0 | 1, imageReceived: 0 | 1): AlertStatus {
  if (response === 0) return 'pending';
  return imageReceived === 1 ? 'completed' : 'responded';
}

function sameActions(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((action, index) => action === b[index]);
}

export function planResponse(alert: AlertState, actions: string[]): AlertPlan {
  if (alert.response === 1) {
    if (sameActions(alert.actions, actions)) return null;
    throw new ConflictError(
      `Alert ${alert.alert_id} already has a response with actions [${alert.actions.join(', ')}]`
    );
  }

  const status = resolveAlertStatus(1, alert.image_received);
  return { patch: { response: 1, actions, status }, status };
}

export function planImage(alert: AlertState, imageUrl: string): AlertPlan {
  if (alert.image_received === 1 && alert.image_url === imageUrl) return null;

  const status = resolveAlertStatus(alert.response, 1);
  return { patch: { image_received: 1, image_url: imageUrl, status }, status };
}
