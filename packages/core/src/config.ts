import { z } from "zod";
import { ConfigError } from "./errors";

export const engineConfigSchema = z.object({
  targetWpm: z.number().positive().default(35),
  emaAlpha: z.number().gt(0).lte(1).default(0.1),
  errorAnomalyThreshold: z.number().positive().default(1.5),
  speedAnomalyThreshold: z.number().positive().default(1.5),
  streakRequired: z.number().int().min(1).max(255).default(3),
  minSamplesForFocus: z.number().int().nonnegative().default(20),
  minSpeedBaselineSamples: z.number().int().min(1).default(10),
  anomalyFloor: z.number().positive().default(0.01),
  maxTrigramEntries: z.number().int().positive().default(5000),
  hesitationFloorMs: z.number().nonnegative().default(800),
  hesitationMultiplier: z.number().positive().default(2.5),
  medianWindowSessions: z.number().int().min(1).default(10),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

export const DEFAULT_CONFIG: EngineConfig = engineConfigSchema.parse({});

export function resolveConfig(input: unknown = {}): EngineConfig {
  const result = engineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      "Invalid engine config",
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return result.data;
}

// 5 chars per word standard: ms per char = 60000 / (WPM * 5)
export function targetTimeMs(config: Pick<EngineConfig, "targetWpm">): number {
  return 60000 / (config.targetWpm * 5);
}

export function targetCpm(config: Pick<EngineConfig, "targetWpm">): number {
  return config.targetWpm * 5;
}
