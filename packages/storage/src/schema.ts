import { z } from "zod";
import type { ProfileData, SessionHistoryData, SymbolStatsData } from "@keyladder/types";

// Bump when a persisted shape changes; older files are reset, not migrated.
export const SCHEMA_VERSION = 1;

const branchProgressSchema = z.object({
  status: z.enum(["locked", "available", "in_progress", "complete"]),
  currentLevel: z.number().int().nonnegative(),
});

export const profileSchema = z.object({
  schemaVersion: z.number().int(),
  skillTree: z.record(z.string(), branchProgressSchema),
  totalScore: z.number().nonnegative(),
  totalSessions: z.number().int().nonnegative(),
  targetWpm: z.number().positive(),
  streakDays: z.number().int().nonnegative().default(0),
  bestStreak: z.number().int().nonnegative().default(0),
  lastPracticeDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .nullable()
    .default(null),
}) satisfies z.ZodType<ProfileData, z.ZodTypeDef, unknown>;

const symbolStatSchema = z.object({
  filteredTimeMs: z.number(),
  bestTimeMs: z.number(),
  confidence: z.number(),
  sampleCount: z.number().int().nonnegative(),
  errorCount: z.number().int().nonnegative(),
  totalCount: z.number().int().nonnegative(),
  errorRateEma: z.number().min(0).max(1).default(0.5),
  recentTimes: z.array(z.number()).default([]),
});

export const symbolStatsSchema = z.object({
  schemaVersion: z.number().int(),
  stats: z.record(z.string(), symbolStatSchema),
}) satisfies z.ZodType<SymbolStatsData, z.ZodTypeDef, unknown>;

const keyTimeSchema = z.object({
  key: z.string(),
  timeMs: z.number().nonnegative(),
  correct: z.boolean(),
});

const sessionRecordSchema = z.object({
  keyTimes: z.array(keyTimeSchema),
  partial: z.boolean().default(false),
  timestamp: z.string(),
});

export const sessionHistorySchema = z.object({
  schemaVersion: z.number().int(),
  sessions: z.array(sessionRecordSchema),
}) satisfies z.ZodType<SessionHistoryData, z.ZodTypeDef, unknown>;
