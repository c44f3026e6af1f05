import { z } from "zod";
import { ValidationError } from "../utils/appError";
import {
  ALERT_STATUSES,
  ALERT_TYPES,
  ROLES,
  TASK_STATUSES,
  type Alert,
  type AlertImage,
  type ProcessingResult,
  type ProcessingTask,
} from "./index";

/** drone_id stored on alert images that were not captured by a specific drone */
export const NO_DRONE = "No Drone";

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const objectPayload = z.record(z.unknown());

const flag = z.union([z.literal(0), z.literal(1)]);

export const LocationSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
  altitude: z.number().optional(),
});

// Inbound payloads

export const AlertInputSchema = z.object({
  alert_id: z.string().min(1).optional(),
  alert_type: z.enum(ALERT_TYPES),
  score: z.number().min(0).max(1),
  location: LocationSchema,
  drone_id: z.string().min(1),
  description: optionalText,
  timestamp: z.coerce.date().optional(),
});
export type AlertInput = z.infer<typeof AlertInputSchema>;

export const AlertResponseInputSchema = z.object({
  actions: z.array(z.string().min(1)),
  response: z.literal(1).default(1),
});

export const AlertImageUpdateSchema = z.object({
  image_url: z.string().min(1),
});

export const ProcessingTaskInputSchema = z.object({
  task_id: z.string().min(1).optional(),
  app_id: z.string().min(1),
  drone_id: z.string().min(1),
  task_type: z.string().min(1),
  input_data: objectPayload.default({}),
  priority: z.number().int().min(1).max(5).default(3),
});
export type ProcessingTaskInput = z.infer<typeof ProcessingTaskInputSchema>;

export const ProcessingResultInputSchema = z
  .object({
    task_id: z.string().min(1),
    result_data: objectPayload.default({}),
    processing_time: z.number().min(0),
    success: z.boolean(),
    error_message: optionalText,
    timestamp: z.coerce.date().optional(),
  })
  .superRefine((value, ctx) => {
    if (!value.success && !value.error_message) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["error_message"],
        message: "Required when success is false",
      });
    }
    if (value.success && value.error_message !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["error_message"],
        message: "Must be absent when success is true",
      });
    }
  });
export type ProcessingResultInput = z.infer<typeof ProcessingResultInputSchema>;

export const TaskStatusUpdateSchema = z.object({
  task_id: z.string().min(1),
  status: z.enum(TASK_STATUSES),
  additional_data: objectPayload.optional(),
});

export const AlertImageInputSchema = z.object({
  alert_image_id: z.string().min(1).optional(),
  found: z.boolean(),
  name: z.string().min(1),
  drone_id: z.string().min(1).default(NO_DRONE),
  actual_image: z.string(),
  matched_frame: z.string(),
  location: LocationSchema,
  timestamp: z.coerce.date().optional(),
});
export type AlertImageInput = z.infer<typeof AlertImageInputSchema>;

export const HandshakeSchema = z.object({
  role: z.enum(ROLES),
  client_id: z.string().trim().min(1).max(128).optional(),
});

export const EnvelopeSchema = z.object({ type: z.string().min(1) }).passthrough();

// Documents read back from the store

export const AlertRecordSchema: z.ZodType<Alert, z.ZodTypeDef, unknown> = z.object({
  alert_id: z.string(),
  alert_type: z.enum(ALERT_TYPES),
  score: z.number(),
  location: LocationSchema,
  drone_id: z.string(),
  created_at: z.coerce.date(),
  response: flag,
  image_received: flag,
  status: z.enum(ALERT_STATUSES),
  actions: z.array(z.string()).default([]),
  description: optionalText,
  image_url: optionalText,
});

export const ProcessingTaskRecordSchema: z.ZodType<ProcessingTask, z.ZodTypeDef, unknown> = z.object({
  task_id: z.string(),
  app_id: z.string(),
  drone_id: z.string(),
  task_type: z.string(),
  input_data: objectPayload.default({}),
  priority: z.number().int(),
  status: z.enum(TASK_STATUSES),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
  additional_data: objectPayload.optional(),
  error_message: optionalText,
});

export const ProcessingResultRecordSchema: z.ZodType<ProcessingResult, z.ZodTypeDef, unknown> =
  z.object({
    task_id: z.string(),
    drone_id: z.string(),
    result_data: objectPayload.default({}),
    processing_time: z.number(),
    success: z.boolean(),
    error_message: optionalText,
    timestamp: z.coerce.date(),
  });

export const AlertImageRecordSchema: z.ZodType<AlertImage, z.ZodTypeDef, unknown> = z.object({
  alert_image_id: z.string(),
  found: z.boolean(),
  name: z.string(),
  drone_id: z.string(),
  actual_image: z.string(),
  matched_frame: z.string(),
  location: LocationSchema,
  timestamp: z.coerce.date(),
});

/**
 * Parse `value` or throw a ValidationError naming the offending paths.
 */
export function parseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  subject: string
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw ValidationError.fromZod(result.error, subject);
  }
  return result.data;
}
