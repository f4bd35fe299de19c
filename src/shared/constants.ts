export const API_PREFIX = 'api/';

export const SECRET_PARAM = 'secret';

export const MAX_PAGE_SIZE = 50;

export const DEFAULT_TASK_TYPE = 'json';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export const HTTP_METHODS = ['GET', 'POST'] as const;

export const ERROR_CODES = [
  'INVALID_ARGUMENT',
  'TASKS_OVER',
  'NO_ROUND_RUNNING',
  'DESERIALIZATION_ERROR',
] as const;
