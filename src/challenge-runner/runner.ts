import type { ChallengeClient } from '@client/client';
import { TaskStatus, type Task } from '@core/contracts';
import { TasksOverError } from '@core/errors';
import { silentLogger, type Logger } from '@shared/logger';
import type { Solver } from './solvers/index';

export type TaskSource = Pick<ChallengeClient, 'fetchNewTask' | 'submitAnswer'>;

export interface RunOptions {
  type: string | null;
  count: number;
  solver: Solver;
  logger?: Logger;
}

export interface RunSummary {
  solved: number;
  failed: number;
  tasksOver: boolean;
}

/**
 * Fetch, solve and submit up to `count` tasks. Stops at the first answer the
 * server does not accept, or when the round runs out of tasks.
 */
export async function runTasks(client: TaskSource, options: RunOptions): Promise<RunSummary> {
  const logger = options.logger ?? silentLogger;
  const summary: RunSummary = { solved: 0, failed: 0, tasksOver: false };

  for (let i = 0; i < options.count; i++) {
    let task: Task;
    try {
      task = await client.fetchNewTask(options.type);
    } catch (err) {
      if (err instanceof TasksOverError) {
        logger.warn(err.message);
        summary.tasksOver = true;
        break;
      }
      throw err;
    }

    const answer = options.solver(task.question);
    const result = await client.submitAnswer(task.id, answer);

    if (result.status !== TaskStatus.Success) {
      summary.failed++;
      logger.warn(`failed (task ${task.id})`);
      break;
    }
    summary.solved++;
    logger.info(`solved (task ${task.id})`);
  }

  return summary;
}
