import { z } from "zod";
import type { BranchDefinition, KeySymbol, SkillTreeDefinition } from "@keyladder/types";
import { ConfigError } from "./errors";
import branchData from "./data/branches.json";

const levelSchema = z.object({
  name: z.string().min(1),
  symbols: z
    .array(z.string().refine((s) => Array.from(s).length === 1, "symbols are single characters"))
    .min(1),
});

const branchSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  unlock: z.enum(["levels", "incremental"]),
  initialSymbols: z.number().int().min(1).optional(),
  levels: z.array(levelSchema).min(1),
});

export const skillTreeDefinitionSchema = z
  .object({
    rootBranch: z.string().min(1),
    branches: z.array(branchSchema).min(1),
  })
  .superRefine((def, ctx) => {
    const ids = new Set<string>();
    for (const branch of def.branches) {
      if (ids.has(branch.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate branch id ${branch.id}` });
      }
      ids.add(branch.id);

      if (branch.unlock === "incremental") {
        if (branch.levels.length !== 1) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `incremental branch ${branch.id} must have exactly one level`,
          });
        } else if ((branch.initialSymbols ?? 1) > branch.levels[0].symbols.length) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `branch ${branch.id} unlocks more symbols up front than it defines`,
          });
        }
      }
    }
    if (!ids.has(def.rootBranch)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `root branch ${def.rootBranch} is not defined` });
    }
  });

export function parseSkillTreeDefinition(input: unknown): SkillTreeDefinition {
  const result = skillTreeDefinitionSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      "Invalid skill tree definition",
      result.error.issues.map((issue) => issue.message)
    );
  }
  return result.data;
}

export const DEFAULT_SKILL_TREE: SkillTreeDefinition = parseSkillTreeDefinition(branchData);

export function branchSymbols(branch: BranchDefinition): KeySymbol[] {
  return branch.levels.flatMap((level) => level.symbols);
}

export function incrementalStart(branch: BranchDefinition): number {
  return Math.min(branch.initialSymbols ?? 1, branchSymbols(branch).length);
}
