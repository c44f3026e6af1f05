import express from "express";
import { createAlertImageController } from "../controllers/alertImageController";
import type { AlertImageService } from "../services/alertImageService";

export default function alertImageRouter(alertImages: AlertImageService) {
  const {
    createAlertImage,
    getAllAlertImages,
    getAlertImage,
    deleteAlertImage,
  } = createAlertImageController(alertImages);

  const router = express.Router();

  router.post("/", createAlertImage);
  router.get("/", getAllAlertImages);
  router.get("/:alertImageId", getAlertImage);
  router.delete("/:alertImageId", deleteAlertImage);

  return router;
}
