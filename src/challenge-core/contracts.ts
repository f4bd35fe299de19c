import { z } from 'zod';

export const TaskStatus = {
  Pending: 0,
  Success: 1,
  Failed: 2,
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

// Rounds are bounded by timezone-aware instants; naive timestamps are rejected.
const instantSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

export const taskStatusSchema = z.nativeEnum(TaskStatus);

export const taskSchema = z
  .object({
    id: z.string(),
    type_id: z.string(),
    question: z.string(),
    user_hint: z.string().nullable().default(null),
    team_answer: z.string().nullable().default(null),
    status: taskStatusSchema,
    points: z.number().int(),
    cost: z.number().int(),
  })
  .readonly();

export const roundSchema = z
  .object({
    id: z.string(),
    start_timestamp: instantSchema,
    end_timestamp: instantSchema,
    can_choose_type: z.boolean(),
  })
  .readonly();

export const challengeSchema = z
  .object({
    id: z.string(),
    title: z.string().nullable().default(null),
    description: z.string().nullable().default(null),
    rounds: z.array(roundSchema).readonly(),
  })
  .readonly();

export type Task = z.infer<typeof taskSchema>;
export type Round = z.infer<typeof roundSchema>;
export type Challenge = z.infer<typeof challengeSchema>;

/**
 * A named wire type: the schema that decodes it and the function that lays a
 * value back out as a snake_case plain object.
 */
export interface Contract<S extends z.ZodTypeAny> {
  readonly name: string;
  readonly schema: S;
  encode(value: z.output<S>): unknown;
}

function encodeRound(round: Round): Record<string, unknown> {
  return {
    id: round.id,
    start_timestamp: round.start_timestamp.toISOString(),
    end_timestamp: round.end_timestamp.toISOString(),
    can_choose_type: round.can_choose_type,
  };
}

export const TaskContract: Contract<typeof taskSchema> = {
  name: 'Task',
  schema: taskSchema,
  encode: (task) => ({ ...task }),
};

export const RoundContract: Contract<typeof roundSchema> = {
  name: 'Round',
  schema: roundSchema,
  encode: encodeRound,
};

export const ChallengeContract: Contract<typeof challengeSchema> = {
  name: 'Challenge',
  schema: challengeSchema,
  encode: (challenge) => ({
    id: challenge.id,
    title: challenge.title,
    description: challenge.description,
    rounds: challenge.rounds.map(encodeRound),
  }),
};

export function listOf<S extends z.ZodTypeAny>(
  contract: Contract<S>,
): Contract<z.ZodArray<S>> {
  return {
    name: `${contract.name}[]`,
    schema: z.array(contract.schema),
    encode: (values) => values.map((value) => contract.encode(value)),
  };
}
