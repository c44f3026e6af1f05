import express from "express";
import { createTaskController } from "../controllers/taskController";
import type { TaskDispatcher } from "../services/taskDispatcher";

export function processingTaskRouter(dispatcher: TaskDispatcher) {
  const { createTask, getTask, getPendingTasks, updateTaskStatus } = createTaskController(dispatcher);
  const router = express.Router();

  router.post("/", createTask);
  router.get("/drone/:droneId/pending", getPendingTasks);
  router.get("/:taskId", getTask);
  router.patch("/:taskId/status", updateTaskStatus);

  return router;
}

export function processingResultRouter(dispatcher: TaskDispatcher) {
  const { createResult, getResult, getDroneResults } = createTaskController(dispatcher);
  const router = express.Router();

  router.post("/", createResult);
  router.get("/drone/:droneId", getDroneResults);
  router.get("/:taskId", getResult);

  return router;
}
