import express from "express";
import { createAlertController } from "../controllers/alertController";
import type { AlertService } from "../services/alertService";
import type { ConnectionRegistry } from "../services/connectionRegistry";

export default function alertRouter(alerts: AlertService, registry: ConnectionRegistry) {
  const {
    getAllAlerts,
    getAlert,
    createAlert,
    respondToAlert,
    recordAlertImage,
  } = createAlertController(alerts, registry);

  const router = express.Router();

  router.get("/", getAllAlerts);
  router.post("/", createAlert);
  router.get("/:alertId", getAlert);

  // Response and image flags
  router.put("/:alertId/response", respondToAlert);
  router.put("/:alertId/image", recordAlertImage);

  return router;
}
