import mongoose from "mongoose";
import { ALERT_STATUSES, ALERT_TYPES } from "../types";
import { COLLECTIONS } from "../services/documentStore";

export const LocationSchema = new mongoose.Schema(
  {
    lat: { type: Number, required: true, min: -90, max: 90 },
    lng: { type: Number, required: true, min: -180, max: 180 },
    altitude: Number,
  },
  { _id: false }
);

const AlertSchema = new mongoose.Schema(
  {
    alert_id: { type: String, required: true, unique: true },
    alert_type: { type: String, enum: [...ALERT_TYPES], required: true },
    score: { type: Number, required: true, min: 0, max: 1 },
    location: { type: LocationSchema, required: true },
    drone_id: { type: String, required: true, index: true },
    description: String,
    created_at: { type: Date, default: Date.now, index: true },
    response: { type: Number, enum: [0, 1], default: 0 },
    image_received: { type: Number, enum: [0, 1], default: 0 },
    status: { type: String, enum: [...ALERT_STATUSES], default: "pending", index: true },
    actions: { type: [String], default: [] },
    image_url: String,
  },
  {
    collection: COLLECTIONS.alerts,
    versionKey: false,
  }
);

const AlertModel = mongoose.model("Alert", AlertSchema);

export default AlertModel;
