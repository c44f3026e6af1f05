export const ROLES = ["drone", "application"] as const;
export type Role = (typeof ROLES)[number];

export const ALERT_TYPES = [
  "intrusion",
  "fire",
  "accident",
  "security_breach",
  "environmental",
  "other",
] as const;
export type AlertType = (typeof ALERT_TYPES)[number];

export const ALERT_STATUSES = ["pending", "responded", "completed"] as const;
export type AlertStatus = (typeof ALERT_STATUSES)[number];

export const TASK_STATUSES = ["pending", "processing", "completed", "failed"] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export interface GeoLocation {
  lat: number;
  lng: number;
  altitude?: number;
}

export interface Alert {
  alert_id: string;
  alert_type: AlertType;
  score: number;
  location: GeoLocation;
  drone_id: string;
  created_at: Date;
  response: 0 | 1;
  image_received: 0 | 1;
  status: AlertStatus;
  actions: string[];
  description?: string;
  image_url?: string;
}

export interface ProcessingTask {
  task_id: string;
  app_id: string;
  drone_id: string;
  task_type: string;
  input_data: Record<string, unknown>;
  priority: number;
  status: TaskStatus;
  created_at: Date;
  updated_at: Date;
  additional_data?: Record<string, unknown>;
  error_message?: string;
}

export interface ProcessingResult {
  task_id: string;
  drone_id: string;
  result_data: Record<string, unknown>;
  processing_time: number;
  success: boolean;
  error_message?: string;
  timestamp: Date;
}

export interface AlertImage {
  alert_image_id: string;
  found: boolean;
  name: string;
  drone_id: string;
  actual_image: string;
  matched_frame: string;
  location: GeoLocation;
  timestamp: Date;
}

// Channel protocol

export const INBOUND_TYPES = [
  "alert",
  "image",
  "processing_result",
  "task_status_update",
  "alert_image",
  "response",
  "processing_task",
  "ping",
] as const;
export type InboundType = (typeof INBOUND_TYPES)[number];

export type OutboundType =
  | "connection_established"
  | "initial_alerts"
  | "new_alert"
  | "alert_update"
  | "processing_task"
  | "processing_result_received"
  | "task_status_update"
  | "alert_image_received"
  | "drone_command"
  | "alert_image"
  | "pong"
  | "error";

export interface OutboundMessage {
  type: OutboundType;
  [field: string]: unknown;
}
