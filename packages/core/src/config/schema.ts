import { z } from 'zod';

export const LEVEL_KEY_PATTERN = /^level([1-9]\d*)$/;

export const BoxListSchema = z.array(z.string().min(1));

export const LevelGraphSchema = z
  .record(z.string(), z.record(z.string(), BoxListSchema))
  .refine((levels) => Object.keys(levels).length > 0, {
    message: 'Level graph must contain at least one level.',
  });

export const HintCatalogSchema = z.record(
  z.string(),
  z.record(z.string(), z.record(z.string(), z.string())),
);

export const FlagRegistrySchema = z.record(z.string(), z.string().min(1));

export const BranchRequirementsSchema = z.object({
  timeLimit: z.number().positive(),
  skill: z.string().min(1),
});

export const BranchCandidateSchema = z.object({
  branch: z.string(),
  requirements: BranchRequirementsSchema.nullable(),
});

export const RequirementTableSchema = z.record(z.string(), z.array(BranchCandidateSchema).min(1));

export const SkillListSchema = z.array(z.string().min(1));

export const GameConfigSchema = z.object({
  levels: LevelGraphSchema,
  hints: HintCatalogSchema.default({}),
  flags: FlagRegistrySchema,
  requirements: RequirementTableSchema.default({}),
  skills: SkillListSchema.default([]),
});

const secondsSchema = z.number().int().nonnegative();
const timestampSchema = z.number().nonnegative();

export const GameStateSchema = z.object({
  level: z.number().int().nonnegative(),
  branch: z.string(),
  lifecycle: z.enum(['not_started', 'in_progress', 'finished']),
  levelLog: z.array(z.string()),
  loadTimes: z.array(z.number().nonnegative()),
  solvingTimes: z.array(secondsSchema),
  gameStartedAt: timestampSchema,
  levelStartedAt: timestampSchema,
  gameEndedAt: timestampSchema,
});

export const HintLedgerSnapshotSchema = z.object({
  totalTaken: z.number().int().nonnegative(),
  taken: z.record(z.string(), z.array(z.string())),
});

export const WrongFlagLogSchema = z.record(z.string(), z.array(z.string()));

export const SessionReportSchema = z.object({
  game: GameStateSchema,
  hints: HintLedgerSnapshotSchema,
  wrongFlags: WrongFlagLogSchema,
  skills: SkillListSchema,
});
