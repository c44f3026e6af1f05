/**
 * Task Dispatcher
 * Delivers processing tasks to their target drone in priority order and routes
 * each result back to the application that requested it
 */

import { randomUUID } from 'node:crypto';
import { ConflictError, NotFoundError } from '../utils/appError';
import {
  ProcessingResultInputSchema,
  ProcessingResultRecordSchema,
  ProcessingTaskInputSchema,
  ProcessingTaskRecordSchema,
  parseWith,
} from '../types/schemas';
import type { ProcessingResult, ProcessingTask, TaskStatus } from '../types';
import type { ConnectionRegistry } from './connectionRegistry';
import { COLLECTIONS, type DocumentStore, type StoreDocument } from './documentStore';
import { assertTransition, isTerminalStatus, settlementPath } from './taskStateMachine';

/** How many delivered result notifications are remembered for de-duplication */
const NOTIFIED_RESULTS_LIMIT = 1000;

/** Higher priority first, then earlier creation first */
export function compareTaskPriority(
  a: Pick<ProcessingTask, 'priority' | 'created_at'>,
  b: Pick<ProcessingTask, 'priority' | 'created_at'>
): number {
  return b.priority - a.priority || a.created_at.getTime() - b.created_at.getTime();
}

/** Stable: tasks with identical keys keep their relative order */
export function orderPending<T extends Pick<ProcessingTask, 'priority' | 'created_at'>>(tasks: readonly T[]): T[] {
  return [...tasks].sort(compareTaskPriority);
}

export interface TaskDispatcherOptions {
  store: DocumentStore;
  registry: ConnectionRegistry;
  now?: () => Date;
  generateId?: () => string;
}

export interface EnqueueResult {
  task: ProcessingTask;
  dispatched: boolean;
}

export class TaskDispatcher {
  private readonly store: DocumentStore;
  private readonly registry: ConnectionRegistry;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  /** task_id -> drone_id for tasks already sent on the drone's current connection */
  private readonly inFlight = new Map<string, string>();
  /** task_ids whose result has been delivered to the application */
  private readonly notifiedResults = new Set<string>();

  constructor(options: TaskDispatcherOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Persist a new pending task and send it right away when its drone is connected.
   */
  async enqueue(input: unknown): Promise<EnqueueResult> {
    const data = parseWith(ProcessingTaskInputSchema, input, 'processing task');
    const createdAt = this.now();

    const task: ProcessingTask = {
      task_id: data.task_id ?? this.generateId(),
      app_id: data.app_id,
      drone_id: data.drone_id,
      task_type: data.task_type,
      input_data: data.input_data,
      priority: data.priority,
      status: 'pending',
      created_at: createdAt,
      updated_at: createdAt,
    };

    await this.store.insert(COLLECTIONS.processingTasks, { ...task });
    console.log(
      `[Dispatcher] Task ${task.task_id} (${task.task_type}, priority ${task.priority}) queued for drone ${task.drone_id}`
    );

    return { task, dispatched: this.dispatch(task) };
  }

  /**
   * Send a pending task to its drone. Sends at most once per task and drone connection.
   */
  dispatch(task: ProcessingTask): boolean {
    if (task.status !== 'pending') return false;
    if (this.inFlight.get(task.task_id) === task.drone_id) return false;
    if (!this.registry.isConnected('drone', task.drone_id)) {
      console.log(`[Dispatcher] Drone ${task.drone_id} offline, task ${task.task_id} stays pending`);
      return false;
    }

    const sent = this.registry.send('drone', task.drone_id, {
      type: 'processing_task',
      task_id: task.task_id,
      task_data: task,
      timestamp: this.now().toISOString(),
    });
    if (sent) {
      this.inFlight.set(task.task_id, task.drone_id);
      console.log(`[Dispatcher] Task ${task.task_id} sent to drone ${task.drone_id}`);
    }
    return sent;
  }

  /**
   * Change-feed path for task inserts, including tasks written over REST or by
   * another process. The inserted image may be stale by the time it arrives.
   */
  async handleTaskInserted(document: StoreDocument): Promise<boolean> {
    const inserted = parseWith(ProcessingTaskRecordSchema, document, 'inserted task');
    if (this.inFlight.get(inserted.task_id) === inserted.drone_id) return false;

    const stored = await this.store.findOne(COLLECTIONS.processingTasks, { task_id: inserted.task_id });
    if (!stored) {
      console.warn(`[Dispatcher] Inserted task ${inserted.task_id} is gone, not dispatching`);
      return false;
    }
    return this.dispatch(parseWith(ProcessingTaskRecordSchema, stored, `stored task ${inserted.task_id}`));
  }

  async pendingTasks(droneId: string): Promise<ProcessingTask[]> {
    const documents = await this.store.find(
      COLLECTIONS.processingTasks,
      { drone_id: droneId, status: 'pending' },
      { sort: { priority: -1, created_at: 1, _id: 1 } }
    );

    const tasks: ProcessingTask[] = [];
    for (const document of documents) {
      const parsed = ProcessingTaskRecordSchema.safeParse(document);
      if (parsed.success) {
        tasks.push(parsed.data);
      } else {
        console.error(`[Dispatcher] Skipping malformed task document for drone ${droneId}:`, parsed.error.issues);
      }
    }
    return orderPending(tasks);
  }

  /**
   * Called when a drone (re)connects: send everything still pending, most urgent first.
   */
  async flushPending(droneId: string): Promise<number> {
    this.releaseDrone(droneId);

    const tasks = await this.pendingTasks(droneId);
    let sent = 0;
    for (const task of tasks) {
      if (this.dispatch(task)) sent++;
    }
    if (tasks.length > 0) {
      console.log(`[Dispatcher] Flushed ${sent}/${tasks.length} pending tasks to drone ${droneId}`);
    }
    return sent;
  }

  /** Forget what was sent on a drone's connection once it is gone */
  releaseDrone(droneId: string): void {
    for (const [taskId, target] of this.inFlight) {
      if (target === droneId) this.inFlight.delete(taskId);
    }
  }

  async getTask(taskId: string): Promise<ProcessingTask> {
    const document = await this.store.findOne(COLLECTIONS.processingTasks, { task_id: taskId });
    if (!document) {
      throw new NotFoundError(`Could not find processing task with ID: ${taskId}`);
    }
    return parseWith(ProcessingTaskRecordSchema, document, `stored task ${taskId}`);
  }

  async getResult(taskId: string): Promise<ProcessingResult> {
    const document = await this.store.findOne(COLLECTIONS.processingResults, { task_id: taskId });
    if (!document) {
      throw new NotFoundError(`Could not find processing result for task: ${taskId}`);
    }
    return parseWith(ProcessingResultRecordSchema, document, `stored result ${taskId}`);
  }

  resultsForDrone(droneId: string, limit: number): Promise<StoreDocument[]> {
    return this.store.find(
      COLLECTIONS.processingResults,
      { drone_id: droneId },
      { sort: { timestamp: -1 }, limit }
    );
  }

  /**
   * Store a drone's result, settle the task and tell the requesting application.
   */
  async reportResult(droneId: string, input: unknown): Promise<ProcessingResult> {
    const data = parseWith(ProcessingResultInputSchema, input, 'processing result');
    const task = await this.getTask(data.task_id);

    if (task.drone_id !== droneId) {
      throw new ConflictError(`Task ${task.task_id} is assigned to drone ${task.drone_id}, not ${droneId}`);
    }
    const path = settlementPath(task.task_id, task.status, data.success);

    const result: ProcessingResult = {
      task_id: data.task_id,
      drone_id: droneId,
      result_data: data.result_data,
      processing_time: data.processing_time,
      success: data.success,
      ...(data.error_message !== undefined ? { error_message: data.error_message } : {}),
      timestamp: data.timestamp ?? this.now(),
    };

    // Settle first so the feed sees a terminal task when the result insert arrives
    const settled = await this.settle(task, path, result);
    try {
      await this.store.insert(COLLECTIONS.processingResults, { ...result });
    } catch (error) {
      await this.unsettle(task, settled);
      throw error;
    }
    this.notifyResult(result, settled);
    return result;
  }

  /**
   * Drone-reported progress. Only forward transitions are accepted.
   */
  async updateStatus(
    taskId: string,
    status: TaskStatus,
    additionalData: Record<string, unknown> = {},
    droneId?: string
  ): Promise<ProcessingTask> {
    const task = await this.getTask(taskId);
    if (droneId !== undefined && task.drone_id !== droneId) {
      throw new ConflictError(`Task ${taskId} is assigned to drone ${task.drone_id}, not ${droneId}`);
    }
    assertTransition(taskId, task.status, status);

    const updatedAt = this.now();
    const applied = await this.store.update(
      COLLECTIONS.processingTasks,
      taskId,
      { status, additional_data: additionalData, updated_at: updatedAt },
      { status: task.status }
    );
    if (!applied) {
      throw new ConflictError(`Task ${taskId} changed while updating to ${status}, retry the request`);
    }

    this.inFlight.delete(taskId);
    const updated: ProcessingTask = { ...task, status, additional_data: additionalData, updated_at: updatedAt };
    console.log(`[Dispatcher] Task ${taskId} ${task.status} -> ${status}`);

    this.registry.send('application', task.app_id, {
      type: 'task_status_update',
      task_id: taskId,
      status,
      drone_id: task.drone_id,
      additional_data: additionalData,
      timestamp: updatedAt.toISOString(),
    });
    return updated;
  }

  /**
   * Change-feed path for result inserts, including results written over REST.
   */
  async handleResultInserted(document: StoreDocument): Promise<void> {
    const result = parseWith(ProcessingResultRecordSchema, document, 'inserted result');

    const stored = await this.store.findOne(COLLECTIONS.processingTasks, { task_id: result.task_id });
    if (!stored) {
      console.warn(`[Dispatcher] Result for unknown task ${result.task_id} ignored`);
      return;
    }
    let task = parseWith(ProcessingTaskRecordSchema, stored, `stored task ${result.task_id}`);

    if (!isTerminalStatus(task.status)) {
      task = await this.settle(task, settlementPath(task.task_id, task.status, result.success), result);
    }
    this.notifyResult(result, task);
  }

  private async settle(task: ProcessingTask, path: TaskStatus[], result: ProcessingResult): Promise<ProcessingTask> {
    const status = path[path.length - 1] ?? task.status;
    const updatedAt = this.now();
    const patch: StoreDocument = { status, updated_at: updatedAt };
    if (result.error_message !== undefined) patch.error_message = result.error_message;

    const applied = await this.store.update(COLLECTIONS.processingTasks, task.task_id, patch, {
      status: task.status,
    });
    if (!applied) {
      throw new ConflictError(`Task ${task.task_id} changed while settling its result`);
    }

    this.inFlight.delete(task.task_id);
    console.log(`[Dispatcher] Task ${task.task_id} ${[task.status, ...path].join(' -> ')}`);
    return {
      ...task,
      status,
      updated_at: updatedAt,
      ...(result.error_message !== undefined ? { error_message: result.error_message } : {}),
    };
  }

  /** A terminal task must have its result stored; put the task back when the result write fails */
  private async unsettle(original: ProcessingTask, settled: ProcessingTask): Promise<void> {
    const restored = await this.store.update(
      COLLECTIONS.processingTasks,
      original.task_id,
      { status: original.status, updated_at: original.updated_at },
      { status: settled.status }
    );
    if (restored) {
      console.warn(`[Dispatcher] Result for task ${original.task_id} not stored, task back to ${original.status}`);
    } else {
      console.error(`[Dispatcher] Could not restore task ${original.task_id} after its result was not stored`);
    }
  }

  private notifyResult(result: ProcessingResult, task: ProcessingTask): void {
    if (this.notifiedResults.has(result.task_id)) return;

    const sent = this.registry.send('application', task.app_id, {
      type: 'processing_result_received',
      task_id: result.task_id,
      status: task.status,
      result_data: result,
      drone_id: result.drone_id,
      app_id: task.app_id,
      timestamp: this.now().toISOString(),
    });
    if (!sent) {
      console.log(`[Dispatcher] Application ${task.app_id} offline, result for ${result.task_id} kept in store`);
    }

    this.notifiedResults.add(result.task_id);
    if (this.notifiedResults.size > NOTIFIED_RESULTS_LIMIT) {
      const oldest = this.notifiedResults.values().next();
      if (!oldest.done) this.notifiedResults.delete(oldest.value);
    }
  }
}
