import mongoose from "mongoose";
import { COLLECTIONS } from "../services/documentStore";
import { NO_DRONE } from "../types/schemas";
import { LocationSchema } from "./alertModel";

const AlertImageSchema = new mongoose.Schema(
  {
    alert_image_id: { type: String, required: true, unique: true },
    found: { type: Boolean, required: true },
    name: { type: String, required: true },
    drone_id: { type: String, default: NO_DRONE, index: true },
    // base64 payloads or URLs, stored as sent
    actual_image: { type: String, default: "" },
    matched_frame: { type: String, default: "" },
    location: { type: LocationSchema, required: true },
    timestamp: { type: Date, default: Date.now, index: true },
  },
  {
    collection: COLLECTIONS.alertImages,
    versionKey: false,
  }
);

const AlertImageModel = mongoose.model("AlertImage", AlertImageSchema);

export default AlertImageModel;
