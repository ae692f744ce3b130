import { z } from 'zod';
import { BOARD_SIZE, Difficulty, parseDifficulty } from '../types/game';
import { InvalidDifficultyError } from '../errors/GameDomainErrors';

// Difficulty label as sent by the client; mapped onto the closed set by
// `requireDifficulty` so that unknown labels report INVALID_DIFFICULTY.
export const DifficultySchema = z
  .string({
    required_error: 'difficulty is required',
    invalid_type_error: 'difficulty must be a string',
  })
  .trim()
  .min(1, 'difficulty must not be empty');

/**
 * @throws InvalidDifficultyError for labels outside easy/medium/hard
 */
export function requireDifficulty(raw: string): Difficulty {
  const parsed = parseDifficulty(raw);
  if (!parsed) {
    throw new InvalidDifficultyError(raw);
  }
  return parsed;
}

// Battle creation. An omitted difficulty falls back to the configured default.
export const CreateBattleSchema = z.object({
  difficulty: DifficultySchema.optional(),
});

export type CreateBattleInput = z.infer<typeof CreateBattleSchema>;

const coordinate = (name: string) =>
  z
    .number({
      required_error: `${name} is required`,
      invalid_type_error: `${name} must be a number`,
    })
    .int(`${name} must be an integer`)
    .min(0, `${name} must be between 0 and ${BOARD_SIZE - 1}`)
    .max(BOARD_SIZE - 1, `${name} must be between 0 and ${BOARD_SIZE - 1}`);

export const MoveSchema = z.object({
  row: coordinate('row'),
  col: coordinate('col'),
});

export type MoveInput = z.infer<typeof MoveSchema>;

export const ChangeDifficultySchema = z.object({
  difficulty: DifficultySchema,
});

export type ChangeDifficultyInput = z.infer<typeof ChangeDifficultySchema>;

export const GameIdParamSchema = z.object({
  gameId: z.string().uuid('gameId must be a UUID'),
});
