import type { ERROR_CODES, HTTP_METHODS, LOG_LEVELS } from './constants';

export type LogLevel = (typeof LOG_LEVELS)[number];
export type HttpMethod = (typeof HTTP_METHODS)[number];
export type ErrorCode = (typeof ERROR_CODES)[number];

export type QueryValue = string | number | boolean;
export type QueryParams = Record<string, QueryValue>;

export interface RequestOptions {
  /** Query parameters, sent form-encoded in the URL */
  query?: QueryParams;
  /** Body, serialized as JSON */
  json?: unknown;
  /** Additional headers */
  headers?: Record<string, string>;
}

export interface TaskPayload {
  id: string;
  typeId: string;
  question: string;
  userHint: string | null;
  teamAnswer: string | null;
  status: number;
  points: number;
  cost: number;
}

export interface RoundPayload {
  id: string;
  startTimestamp: string;
  endTimestamp: string;
  canChooseType: boolean;
}

export interface ChallengePayload {
  id: string;
  title: string | null;
  description: string | null;
  rounds: RoundPayload[];
}

export interface SubmitAnswerBody {
  answer: string;
}
