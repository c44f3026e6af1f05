import { z } from "zod";
import { serialize } from "../services/serializer";
import { droneCommand, type AlertService } from "../services/alertService";
import type { ConnectionRegistry } from "../services/connectionRegistry";
import {
  AlertImageUpdateSchema,
  AlertResponseInputSchema,
  parseWith,
} from "../types/schemas";
import catchAsync from "../utils/catchAsync";

export const ListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export function createAlertController(alerts: AlertService, registry: ConnectionRegistry) {
  const getAllAlerts = catchAsync(async (req, res) => {
    const { limit } = parseWith(ListQuerySchema, req.query, "query");
    const documents = await alerts.recentAlerts(limit);

    res.status(200).json({
      status: "success",
      results: documents.length,
      data: {
        alerts: serialize(documents),
      },
    });
  });

  const getAlert = catchAsync(async (req, res) => {
    const alert = await alerts.getAlert(req.params.alertId);

    res.status(200).json({
      status: "success",
      data: {
        alert: serialize(alert),
      },
    });
  });

  const createAlert = catchAsync(async (req, res) => {
    const alert = await alerts.createAlert(req.body);

    res.status(201).json({
      status: "success",
      data: {
        alert: serialize(alert),
      },
    });
  });

  // Same path as a `response` message from an application channel
  const respondToAlert = catchAsync(async (req, res) => {
    const { actions, response } = parseWith(AlertResponseInputSchema, req.body, "alert response");
    const { alert, changed } = await alerts.recordResponse(req.params.alertId, actions, response);

    if (changed) {
      registry.send("drone", alert.drone_id, droneCommand(alert, new Date()));
    }

    res.status(200).json({
      status: "success",
      data: {
        alert: serialize(alert),
        changed,
      },
    });
  });

  const recordAlertImage = catchAsync(async (req, res) => {
    const { image_url } = parseWith(AlertImageUpdateSchema, req.body, "alert image update");
    const { alert, changed } = await alerts.recordImage(req.params.alertId, image_url);

    res.status(200).json({
      status: "success",
      data: {
        alert: serialize(alert),
        changed,
      },
    });
  });

  return { getAllAlerts, getAlert, createAlert, respondToAlert, recordAlertImage };
}
