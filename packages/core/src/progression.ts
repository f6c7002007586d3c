import type {
  BranchDefinition,
  BranchId,
  BranchProgress,
  BranchStatus,
  DrillScope,
  KeySymbol,
  SkillTreeChangeset,
  SkillTreeDefinition,
  SkillTreeProgress,
} from "@keyladder/types";
import { DEFAULT_SKILL_TREE, branchSymbols, incrementalStart } from "./branches";
import { UnknownBranchError } from "./errors";
import { computeComplexity } from "./scoring";

export const MASTERY_CONFIDENCE = 1.0;

export interface ConfidenceSource {
  confidence(symbol: KeySymbol): number;
}

export const GLOBAL_SCOPE: DrillScope = { kind: "global" };

interface TreeSnapshot {
  statuses: Map<BranchId, BranchStatus>;
  unlockedCount: number;
  allComplete: boolean;
}

export function createInitialProgress(definition: SkillTreeDefinition): SkillTreeProgress {
  const progress: SkillTreeProgress = {};
  for (const branch of definition.branches) {
    progress[branch.id] = {
      status: branch.id === definition.rootBranch ? "in_progress" : "locked",
      currentLevel: 0,
    };
  }
  return progress;
}

function uniqueInOrder(symbols: KeySymbol[]): KeySymbol[] {
  return Array.from(new Set(symbols));
}

export class SkillTree {
  readonly definition: SkillTreeDefinition;
  readonly totalUniqueSymbols: number;
  private branches = new Map<BranchId, BranchDefinition>();
  private progress: SkillTreeProgress;

  constructor(definition: SkillTreeDefinition = DEFAULT_SKILL_TREE, saved?: SkillTreeProgress) {
    this.definition = definition;
    definition.branches.forEach((b) => this.branches.set(b.id, b));
    this.totalUniqueSymbols = new Set(definition.branches.flatMap(branchSymbols)).size;

    this.progress = createInitialProgress(definition);
    if (saved) {
      for (const [id, bp] of Object.entries(saved)) {
        const branch = this.branches.get(id);
        if (branch) this.progress[id] = this.sanitize(branch, bp);
      }
    }
  }

  // ------------------------
  // Queries
  // ------------------------

  branch(id: BranchId): BranchDefinition {
    const branch = this.branches.get(id);
    if (!branch) throw new UnknownBranchError(id);
    return branch;
  }

  status(id: BranchId): BranchStatus {
    return this.branchProgress(id).status;
  }

  branchProgress(id: BranchId): Readonly<BranchProgress> {
    this.branch(id);
    return this.progress[id];
  }

  unlockedSymbols(scope: DrillScope = GLOBAL_SCOPE): KeySymbol[] {
    if (scope.kind === "global") {
      return uniqueInOrder(this.definition.branches.flatMap((b) => this.branchUnlocked(b)));
    }

    const target = this.branch(scope.branch);
    const symbols: KeySymbol[] = [];
    // Branch drills run on a background of the root branch's symbols.
    if (target.id !== this.definition.rootBranch) {
      symbols.push(...this.branchUnlocked(this.branch(this.definition.rootBranch)));
    }
    symbols.push(...this.branchUnlocked(target));
    return uniqueInOrder(symbols);
  }

  /**
   * Symbols that may become the focus target. Earlier levels of an in-progress
   * branch are unlocked for reinforcement but never focus candidates.
   */
  focusCandidates(scope: DrillScope = GLOBAL_SCOPE): KeySymbol[] {
    if (scope.kind === "branch") {
      return this.branchFocusCandidates(this.branch(scope.branch));
    }
    return uniqueInOrder(this.definition.branches.flatMap((b) => this.branchFocusCandidates(b)));
  }

  /** Weakest not-yet-confident candidate; the first in definition order wins ties. */
  focusedSymbol(scope: DrillScope, stats: ConfidenceSource): KeySymbol | null {
    let weakest: KeySymbol | null = null;
    let weakestConfidence = Infinity;

    for (const symbol of this.focusCandidates(scope)) {
      const confidence = stats.confidence(symbol);
      if (confidence < MASTERY_CONFIDENCE && confidence < weakestConfidence) {
        weakest = symbol;
        weakestConfidence = confidence;
      }
    }
    return weakest;
  }

  totalUnlockedCount(): number {
    return this.unlockedSymbols(GLOBAL_SCOPE).length;
  }

  complexity(): number {
    return computeComplexity(this.totalUnlockedCount(), this.totalUniqueSymbols);
  }

  branchTotalSymbols(id: BranchId): number {
    return branchSymbols(this.branch(id)).length;
  }

  branchConfidentSymbols(id: BranchId, stats: ConfidenceSource): number {
    return branchSymbols(this.branch(id)).filter((s) => stats.confidence(s) >= MASTERY_CONFIDENCE).length;
  }

  toJSON(): SkillTreeProgress {
    const out: SkillTreeProgress = {};
    for (const [id, bp] of Object.entries(this.progress)) {
      out[id] = { ...bp };
    }
    return out;
  }

  // ------------------------
  // Transitions
  // ------------------------

  /** Available -> InProgress. Returns false when the branch was not available. */
  startBranch(id: BranchId): boolean {
    const bp = this.branchProgress(id);
    if (bp.status !== "available") return false;
    this.progress[id] = { status: "in_progress", currentLevel: 0 };
    return true;
  }

  /**
   * Recomputes level advancement and completion from current confidences.
   * Every flag in the changeset is set only on the call that made it true.
   */
  update(stats: ConfidenceSource): SkillTreeChangeset {
    const before = this.snapshot();

    for (const branch of this.definition.branches) {
      if (this.progress[branch.id].status === "in_progress") {
        this.advance(branch, stats);
      }
    }

    if (this.progress[this.definition.rootBranch].status === "complete") {
      for (const branch of this.definition.branches) {
        if (this.progress[branch.id].status === "locked") {
          this.progress[branch.id] = { status: "available", currentLevel: 0 };
        }
      }
    }

    const after = this.snapshot();
    const changedTo = (status: BranchStatus) =>
      this.definition.branches
        .map((b) => b.id)
        .filter((id) => after.statuses.get(id) === status && before.statuses.get(id) !== status);

    return {
      newlyAvailable: changedTo("available"),
      newlyCompleted: changedTo("complete"),
      allSymbolsUnlocked:
        after.unlockedCount === this.totalUniqueSymbols && before.unlockedCount < this.totalUniqueSymbols,
      allBranchesComplete: after.allComplete && !before.allComplete,
    };
  }

  // ------------------------
  // Internals
  // ------------------------

  private advance(branch: BranchDefinition, stats: ConfidenceSource) {
    const confident = (symbols: KeySymbol[]) => symbols.every((s) => stats.confidence(s) >= MASTERY_CONFIDENCE);
    const all = branchSymbols(branch);
    let level = this.progress[branch.id].currentLevel;

    if (branch.unlock === "incremental") {
      // currentLevel counts symbols unlocked beyond the initial set
      const start = incrementalStart(branch);
      for (;;) {
        const unlocked = all.slice(0, Math.min(start + level, all.length));
        if (!confident(unlocked)) break;
        if (unlocked.length >= all.length) {
          this.progress[branch.id] = { status: "complete", currentLevel: all.length - start };
          return;
        }
        level += 1;
      }
      this.progress[branch.id] = { status: "in_progress", currentLevel: level };
      return;
    }

    const last = branch.levels.length - 1;
    while (confident(branch.levels[level].symbols)) {
      if (level === last) {
        if (confident(all)) {
          this.progress[branch.id] = { status: "complete", currentLevel: branch.levels.length };
          return;
        }
        break;
      }
      level += 1;
    }
    this.progress[branch.id] = { status: "in_progress", currentLevel: level };
  }

  private branchUnlocked(branch: BranchDefinition): KeySymbol[] {
    const bp = this.progress[branch.id];
    const all = branchSymbols(branch);

    switch (bp.status) {
      case "complete":
        return all;
      case "in_progress":
        if (branch.unlock === "incremental") {
          return all.slice(0, Math.min(incrementalStart(branch) + bp.currentLevel, all.length));
        }
        return branch.levels.slice(0, bp.currentLevel + 1).flatMap((level) => level.symbols);
      default:
        return [];
    }
  }

  private branchFocusCandidates(branch: BranchDefinition): KeySymbol[] {
    const bp = this.progress[branch.id];
    switch (bp.status) {
      case "complete":
        return branchSymbols(branch);
      case "in_progress":
        if (branch.unlock === "incremental") return this.branchUnlocked(branch);
        return [...branch.levels[bp.currentLevel].symbols];
      default:
        return [];
    }
  }

  private snapshot(): TreeSnapshot {
    const statuses = new Map<BranchId, BranchStatus>();
    for (const branch of this.definition.branches) {
      statuses.set(branch.id, this.progress[branch.id].status);
    }
    return {
      statuses,
      unlockedCount: this.totalUnlockedCount(),
      allComplete: Array.from(statuses.values()).every((s) => s === "complete"),
    };
  }

  // Saved progress from an older definition may point past the last level.
  private sanitize(branch: BranchDefinition, bp: BranchProgress): BranchProgress {
    const level = Math.max(0, Math.floor(bp.currentLevel));
    if (bp.status === "complete") return { status: "complete", currentLevel: level };
    if (bp.status !== "in_progress") return { status: bp.status, currentLevel: 0 };

    const maxLevel =
      branch.unlock === "incremental"
        ? branchSymbols(branch).length - incrementalStart(branch)
        : branch.levels.length - 1;
    return { status: "in_progress", currentLevel: Math.min(level, maxLevel) };
  }
}
