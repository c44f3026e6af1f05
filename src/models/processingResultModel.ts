import mongoose from "mongoose";
import { COLLECTIONS } from "../services/documentStore";

const ProcessingResultSchema = new mongoose.Schema(
  {
    task_id: { type: String, required: true, unique: true },
    drone_id: { type: String, required: true, index: true },
    result_data: { type: mongoose.Schema.Types.Mixed, default: {} },
    processing_time: { type: Number, required: true, min: 0 },
    success: { type: Boolean, required: true },
    error_message: String,
    timestamp: { type: Date, default: Date.now, index: true },
  },
  {
    collection: COLLECTIONS.processingResults,
    versionKey: false,
    minimize: false,
  }
);

const ProcessingResultModel = mongoose.model("ProcessingResult", ProcessingResultSchema);

export default ProcessingResultModel;
