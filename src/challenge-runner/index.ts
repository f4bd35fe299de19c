import { ChallengeClient } from '@client/client';
import { createLogger } from '@shared/logger';
import { config } from './config';
import { runTasks } from './runner';
import { getSolver } from './solvers/index';

const logger = createLogger('RUNNER', config.logLevel);

async function start() {
  if (!config.secret) {
    throw new Error('CHALLENGE_SECRET is not set');
  }

  const client = await ChallengeClient.create({
    secret: config.secret,
    baseUrl: config.baseUrl,
    roundId: config.roundId,
    challengeId: config.challengeId,
    logger: createLogger('CLIENT', config.logLevel),
  });
  logger.info(`Working in round ${client.round.id}`);

  const summary = await runTasks(client, {
    type: config.taskType,
    count: config.taskCount,
    solver: getSolver(config.taskType),
    logger,
  });

  logger.info(
    `Done: ${summary.solved} solved, ${summary.failed} failed${summary.tasksOver ? ', tasks over' : ''}`,
  );
  if (summary.failed > 0) process.exitCode = 1;
}

start().catch((err) => {
  logger.error('Failed to start:', err);
  process.exit(1);
});
