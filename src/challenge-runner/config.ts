import 'dotenv/config';
import { DEFAULT_TASK_TYPE } from '@shared/constants';
import { isLogLevel } from '@shared/logger';

const logLevel = process.env.LOG_LEVEL || 'info';
const DEFAULT_TASK_COUNT = 50;

function parseTaskCount(raw: string | undefined): number {
  const count = raw && /^\s*\d+\s*$/.test(raw) ? parseInt(raw, 10) : NaN;
  return count > 0 ? count : DEFAULT_TASK_COUNT;
}

export const config = {
  secret: process.env.CHALLENGE_SECRET || '',
  baseUrl: process.env.CHALLENGE_BASE_URL || 'http://localhost:8000/',
  challengeId: process.env.CHALLENGE_ID || undefined,
  roundId: process.env.CHALLENGE_ROUND_ID || undefined,
  taskType: process.env.CHALLENGE_TASK_TYPE || DEFAULT_TASK_TYPE,
  taskCount: parseTaskCount(process.env.CHALLENGE_TASK_COUNT),
  logLevel: isLogLevel(logLevel) ? logLevel : 'info',
} as const;
