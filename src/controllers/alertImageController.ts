import type { AlertImageService } from "../services/alertImageService";
import { serialize } from "../services/serializer";
import { parseWith } from "../types/schemas";
import catchAsync from "../utils/catchAsync";
import { ListQuerySchema } from "./alertController";

export function createAlertImageController(alertImages: AlertImageService) {
  const createAlertImage = catchAsync(async (req, res) => {
    const image = await alertImages.create(req.body);

    res.status(201).json({
      status: "success",
      data: {
        alert_image: serialize(image),
      },
    });
  });

  const getAllAlertImages = catchAsync(async (req, res) => {
    const { limit } = parseWith(ListQuerySchema, req.query, "query");
    const images = await alertImages.list(limit);

    res.status(200).json({
      status: "success",
      results: images.length,
      data: {
        alert_images: serialize(images),
      },
    });
  });

  const getAlertImage = catchAsync(async (req, res) => {
    const image = await alertImages.get(req.params.alertImageId);

    res.status(200).json({
      status: "success",
      data: {
        alert_image: serialize(image),
      },
    });
  });

  const deleteAlertImage = catchAsync(async (req, res) => {
    await alertImages.remove(req.params.alertImageId);

    res.status(204).json({
      status: "success",
      data: null,
    });
  });

  return { createAlertImage, getAllAlertImages, getAlertImage, deleteAlertImage };
}
