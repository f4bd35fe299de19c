import {
  ChallengeContract,
  TaskContract,
  listOf,
  type Challenge,
  type Round,
  type Task,
  type TaskStatus,
} from '@core/contracts';
import { NoRoundCurrentlyRunningError, TasksOverError, ValidationError } from '@core/errors';
import { alwaysActiveRound, findCurrentRound } from '@core/rounds';
import { decode } from '@core/serialization';
import { MAX_PAGE_SIZE } from '@shared/constants';
import { silentLogger, type Logger } from '@shared/logger';
import type { QueryParams, SubmitAnswerBody } from '@shared/types';
import { HttpError, HttpTransport } from './transport';

export interface ChallengeClientOptions {
  /** Secret token the team was given */
  secret: string;
  /** Root of the challenge site, e.g. "https://challenge.example.com/". Must not include "api/". */
  baseUrl: string;
  /** Round to work in. Takes precedence over `challengeId`. */
  roundId?: string;
  /** Challenge whose currently running round is picked when `roundId` is absent */
  challengeId?: string;
  fetch?: typeof fetch;
  logger?: Logger;
}

const TaskListContract = listOf(TaskContract);

/**
 * Client for the task challenge API.
 *
 * `secret` and `round` are public and may be reassigned at runtime; every
 * request reads them afresh. `round` scopes `fetchNewTask` and `getTasks`.
 *
 * @example
 * ```typescript
 * const client = await ChallengeClient.create({
 *   secret: process.env.CHALLENGE_SECRET ?? '',
 *   baseUrl: 'https://challenge.example.com/',
 *   challengeId: 'course-2026',
 * });
 *
 * const task = await client.fetchNewTask('json');
 * const result = await client.submitAnswer(task.id, solve(task.question));
 * if (result.status !== TaskStatus.Success) console.warn('wrong answer');
 * ```
 */
export class ChallengeClient {
  secret: string;
  round: Round;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  private constructor(secret: string, round: Round, transport: HttpTransport, logger: Logger) {
    this.secret = secret;
    this.round = round;
    this.transport = transport;
    this.logger = logger;
  }

  /**
   * Create a client bound to a round.
   *
   * With `roundId` the round is trusted as given (always active, type choice
   * allowed) and nothing is fetched. Otherwise the challenge is fetched and
   * the round running right now is picked.
   *
   * @throws ValidationError if neither `roundId` nor `challengeId` is given
   * @throws NoRoundCurrentlyRunningError if no round of the challenge is running
   */
  static async create(options: ChallengeClientOptions): Promise<ChallengeClient> {
    const { secret, roundId, challengeId } = options;
    const logger = options.logger ?? silentLogger;

    const transport = new HttpTransport({
      baseUrl: options.baseUrl,
      fetch: options.fetch,
      logger,
    });

    if (roundId !== undefined) {
      return new ChallengeClient(secret, alwaysActiveRound(roundId), transport, logger);
    }
    if (challengeId === undefined) {
      throw new ValidationError('Either roundId or challengeId must be provided');
    }

    const challenge = decode(
      await transport.get(challengePath(challengeId), secret),
      ChallengeContract,
    );
    const round = findCurrentRound(challenge.rounds);
    if (!round) {
      throw new NoRoundCurrentlyRunningError(challengeId);
    }

    logger.info(`Round ${round.id} of challenge ${challenge.id} is running`);
    return new ChallengeClient(secret, round, transport, logger);
  }

  /**
   * Fetch a new task, optionally of a given type.
   *
   * @param type - task type (e.g. "math"); a task of any type when omitted
   * @throws ValidationError if a type is given but the round does not allow choosing it
   * @throws TasksOverError if no tasks of this type are left in the round
   */
  async fetchNewTask(type: string | null = null): Promise<Task> {
    const query: QueryParams = { round: this.round.id };
    if (type !== null) {
      if (!this.round.can_choose_type) {
        throw new ValidationError('You are not allowed to choose the task type in this round', {
          roundId: this.round.id,
          taskType: type,
        });
      }
      query.type = type;
    }

    let body: string;
    try {
      body = await this.transport.post('tasks', this.secret, { query });
    } catch (err) {
      if (err instanceof HttpError && err.status === 400) {
        this.logger.info(`No tasks left in round ${this.round.id}`);
        throw new TasksOverError(type, { cause: err });
      }
      throw err;
    }
    return decode(body, TaskContract);
  }

  /**
   * Submit an answer. The returned task carries the verdict in `status`.
   */
  async submitAnswer(taskId: string, answer: string): Promise<Task> {
    const json: SubmitAnswerBody = { answer };
    const body = await this.transport.post(`tasks/${taskId}`, this.secret, { json });
    return decode(body, TaskContract);
  }

  /**
   * List existing tasks of the bound round. Never creates new ones.
   *
   * @param count - page size, at most 50
   * @throws ValidationError if `count` exceeds 50
   */
  async getTasks(
    type: string,
    status: TaskStatus,
    offset = 0,
    count = MAX_PAGE_SIZE,
  ): Promise<Task[]> {
    if (count > MAX_PAGE_SIZE) {
      throw new ValidationError(`count has to be <= ${MAX_PAGE_SIZE}`, { count });
    }

    const body = await this.transport.get('tasks', this.secret, {
      query: { round: this.round.id, type, status, offset, count },
    });
    return decode(body, TaskListContract);
  }

  async getTask(id: string): Promise<Task> {
    return decode(await this.transport.get(`tasks/${id}`, this.secret), TaskContract);
  }

  async getChallenge(id: string): Promise<Challenge> {
    return decode(await this.transport.get(challengePath(id), this.secret), ChallengeContract);
  }
}

function challengePath(id: string): string {
  return `challenges/${id}/`;
}
