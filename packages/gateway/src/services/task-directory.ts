/**
 * Task Directory
 *
 * Source of the task descriptors served by GET /get_task. Read-only.
 * The static directory is the default; PostgresTaskDirectory reads the
 * `tasks` table when TASK_SOURCE=database.
 */

import type { TaskDescriptor } from '../submission/index.js';

export interface TaskDirectory {
  /**
   * The task miners should currently work on, or null when none is active.
   */
  current(): Promise<TaskDescriptor | null>;

  get(taskId: string): Promise<TaskDescriptor | null>;
}

export const DEFAULT_TASK: TaskDescriptor = {
  task_id: 'task-prod-001',
  performance_threshold: 0.9,
  validation_data_hash: 'deadbeef...',
};

export class StaticTaskDirectory implements TaskDirectory {
  private tasks: TaskDescriptor[];

  /**
   * The first task is the current one.
   */
  constructor(tasks: TaskDescriptor[] = [DEFAULT_TASK]) {
    this.tasks = tasks.map((t) => ({ ...t }));
  }

  async current(): Promise<TaskDescriptor | null> {
    const task = this.tasks[0];
    return task ? { ...task } : null;
  }

  async get(taskId: string): Promise<TaskDescriptor | null> {
    const task = this.tasks.find((t) => t.task_id === taskId);
    return task ? { ...task } : null;
  }
}
