import { z } from "zod";
import { serialize } from "../services/serializer";
import type { TaskDispatcher } from "../services/taskDispatcher";
import { TaskStatusUpdateSchema, parseWith } from "../types/schemas";
import catchAsync from "../utils/catchAsync";
import { ListQuerySchema } from "./alertController";

const StatusBodySchema = TaskStatusUpdateSchema.omit({ task_id: true }).extend({
  drone_id: z.string().min(1).optional(),
});

const ReporterSchema = z.object({ drone_id: z.string().min(1) });

export function createTaskController(dispatcher: TaskDispatcher) {
  const createTask = catchAsync(async (req, res) => {
    const { task, dispatched } = await dispatcher.enqueue(req.body);

    res.status(201).json({
      status: "success",
      data: {
        task: serialize(task),
        dispatched,
      },
    });
  });

  const getTask = catchAsync(async (req, res) => {
    const task = await dispatcher.getTask(req.params.taskId);

    res.status(200).json({
      status: "success",
      data: {
        task: serialize(task),
      },
    });
  });

  // Pull endpoint for drones that poll instead of holding a channel
  const getPendingTasks = catchAsync(async (req, res) => {
    const tasks = await dispatcher.pendingTasks(req.params.droneId);

    res.status(200).json({
      status: "success",
      results: tasks.length,
      data: {
        tasks: serialize(tasks),
      },
    });
  });

  const updateTaskStatus = catchAsync(async (req, res) => {
    const body = parseWith(StatusBodySchema, req.body, "task status update");
    const task = await dispatcher.updateStatus(
      req.params.taskId,
      body.status,
      body.additional_data,
      body.drone_id
    );

    res.status(200).json({
      status: "success",
      data: {
        task: serialize(task),
      },
    });
  });

  const createResult = catchAsync(async (req, res) => {
    const { drone_id } = parseWith(ReporterSchema, req.body, "processing result");
    const result = await dispatcher.reportResult(drone_id, req.body);

    res.status(201).json({
      status: "success",
      data: {
        result: serialize(result),
      },
    });
  });

  const getResult = catchAsync(async (req, res) => {
    const result = await dispatcher.getResult(req.params.taskId);

    res.status(200).json({
      status: "success",
      data: {
        result: serialize(result),
      },
    });
  });

  const getDroneResults = catchAsync(async (req, res) => {
    const { limit } = parseWith(ListQuerySchema, req.query, "query");
    const results = await dispatcher.resultsForDrone(req.params.droneId, limit);

    res.status(200).json({
      status: "success",
      results: results.length,
      data: {
        results: serialize(results),
      },
    });
  });

  return {
    createTask,
    getTask,
    getPendingTasks,
    updateTaskStatus,
    createResult,
    getResult,
    getDroneResults,
  };
}
