import mongoose from "mongoose";
import { TASK_STATUSES } from "../types";
import { COLLECTIONS } from "../services/documentStore";

const ProcessingTaskSchema = new mongoose.Schema(
  {
    task_id: { type: String, required: true, unique: true },
    app_id: { type: String, required: true },
    drone_id: { type: String, required: true },
    task_type: { type: String, required: true },
    input_data: { type: mongoose.Schema.Types.Mixed, default: {} },
    priority: { type: Number, min: 1, max: 5, default: 3 },
    status: { type: String, enum: [...TASK_STATUSES], default: "pending" },
    created_at: { type: Date, default: Date.now },
    updated_at: { type: Date, default: Date.now },
    additional_data: mongoose.Schema.Types.Mixed,
    error_message: String,
  },
  {
    collection: COLLECTIONS.processingTasks,
    versionKey: false,
    minimize: false,
  }
);

// Pending lookup on drone reconnect, most urgent first
ProcessingTaskSchema.index({ drone_id: 1, status: 1, priority: -1, created_at: 1 });

const ProcessingTaskModel = mongoose.model("ProcessingTask", ProcessingTaskSchema);

export default ProcessingTaskModel;
