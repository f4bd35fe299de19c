import { ValidationError } from '@core/errors';
import { solveJsonSum } from './json-sum';

/** Turns a task question into the answer text. */
export type Solver = (question: string) => string;

export const SOLVERS: Readonly<Record<string, Solver>> = {
  json: solveJsonSum,
};

export function getSolver(taskType: string): Solver {
  const solver = SOLVERS[taskType];
  if (!solver) {
    throw new ValidationError(`No solver for task type: ${taskType}`, {
      known: Object.keys(SOLVERS),
    });
  }
  return solver;
}

export { findSum, solveJsonSum } from './json-sum';
