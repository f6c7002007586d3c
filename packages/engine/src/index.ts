import type {
  BranchId,
  DrillScope,
  FocusSelection,
  FocusTarget,
  KeySymbol,
  KeyTime,
  Logger,
  PracticeStreak,
  ProfileStorage,
  SessionRecord,
  SkillTreeChangeset,
  SkillTreeDefinition,
} from "@keyladder/types";
import {
  ConfigError,
  DEFAULT_CONFIG,
  DEFAULT_SKILL_TREE,
  EMPTY_STREAK,
  GLOBAL_SCOPE,
  PracticeModel,
  SkillTree,
  SymbolStatsStore,
  computeScore,
  levelFromScore,
  normalizeSymbol,
  primaryFocus,
  recordPracticeDay,
  replayHistory,
  resolveConfig,
  sameFocus,
  selectFocus,
  summarizeSession,
  targetTimeMs,
  type EngineConfig,
  type EngineConfigInput,
} from "@keyladder/core";
import { SCHEMA_VERSION } from "@keyladder/storage";

export interface MasteryState {
  scope: DrillScope;
  focus: FocusSelection;
  targetWpm: number;
  totalScore: number;
  totalSessions: number;
  level: number;
  hesitationThresholdMs: number;
  streak: PracticeStreak;
  // Transitions from the most recent tree update, whatever caused it
  lastChangeset: SkillTreeChangeset;
  isLoaded: boolean;
}

export interface SessionOutcome {
  changeset: SkillTreeChangeset;
  focus: FocusSelection;
  focusChanged: boolean;
  score: number;
  hesitationThresholdMs: number;
}

export interface MasteryEngineOptions {
  storage?: ProfileStorage;
  config?: EngineConfigInput;
  definition?: SkillTreeDefinition;
  logger?: Logger;
  now?: () => Date;
}

export interface CompleteSessionOptions {
  partial?: boolean;
}

type Listener = (state: MasteryState) => void;

const EMPTY_FOCUS: FocusSelection = { charFocus: null, pairFocus: null };
const NO_CHANGES: SkillTreeChangeset = {
  newlyAvailable: [],
  newlyCompleted: [],
  allSymbolsUnlocked: false,
  allBranchesComplete: false,
};

/**
 * Owns the live statistics, the skill tree and the persisted profile.
 * Consumers report finished sessions and read back the next focus target.
 */
export class MasteryEngine {
  // ------------------------
  // Engine State
  // ------------------------

  private state: MasteryState;
  private listeners: Listener[] = [];

  // ------------------------
  // Core components
  // ------------------------

  private config: EngineConfig;
  private model: PracticeModel;
  private tree: SkillTree;
  private history: SessionRecord[] = [];

  private storage?: ProfileStorage;
  private definition: SkillTreeDefinition;
  private logger: Logger;
  private now: () => Date;

  constructor(options: MasteryEngineOptions = {}) {
    this.config = options.config ? resolveConfig(options.config) : DEFAULT_CONFIG;
    this.storage = options.storage;
    this.definition = options.definition ?? DEFAULT_SKILL_TREE;
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());

    this.model = new PracticeModel(this.config);
    this.tree = new SkillTree(this.definition);
    this.state = {
      scope: GLOBAL_SCOPE,
      focus: EMPTY_FOCUS,
      targetWpm: this.config.targetWpm,
      totalScore: 0,
      totalSessions: 0,
      level: 1,
      hesitationThresholdMs: this.config.hesitationFloorMs,
      streak: EMPTY_STREAK,
      lastChangeset: NO_CHANGES,
      isLoaded: false,
    };
  }

  // ------------------------
  // Initialization
  // ------------------------

  /** Returns the transitions that loading surfaced, e.g. after a definition update. */
  async init(): Promise<SkillTreeChangeset> {
    const [profile, symbolStats, history] = this.storage
      ? await Promise.all([
          this.storage.loadProfile(),
          this.storage.loadSymbolStats(),
          this.storage.loadHistory(),
        ])
      : [null, null, null];

    if (profile) {
      this.config = { ...this.config, targetWpm: profile.targetWpm };
      this.state.targetWpm = profile.targetWpm;
      this.state.totalScore = profile.totalScore;
      this.state.totalSessions = profile.totalSessions;
      this.state.level = levelFromScore(profile.totalScore);
      this.state.streak = {
        streakDays: profile.streakDays,
        bestStreak: profile.bestStreak,
        lastPracticeDate: profile.lastPracticeDate,
      };
    }

    // Pair statistics are never stored; the history is the source of truth for them.
    this.history = history ? history.sessions : [];
    this.model = replayHistory(this.history, this.config);
    if (symbolStats) {
      this.model.adoptSymbolStats(
        SymbolStatsStore.fromJSON(symbolStats.stats, {
          targetTimeMs: targetTimeMs(this.config),
          emaAlpha: this.config.emaAlpha,
        })
      );
    }

    this.tree = new SkillTree(this.definition, profile?.skillTree);
    // Saved progress may predate a target change or a definition update.
    const changeset = this.tree.update(this.model.symbols);

    this.state.lastChangeset = changeset;
    this.state.hesitationThresholdMs = this.model.currentHesitationThreshold();
    this.state.focus = this.computeFocus();
    this.state.isLoaded = true;
    this.notify();
    return changeset;
  }

  // ------------------------
  // Public API
  // ------------------------

  async completeSession(keyTimes: KeyTime[], options: CompleteSessionOptions = {}): Promise<SessionOutcome> {
    this.assertLoaded();

    const now = this.now();
    const record: SessionRecord = {
      keyTimes: this.normalizeKeyTimes(keyTimes),
      partial: options.partial ?? false,
      timestamp: now.toISOString(),
    };
    // Complexity is what the user was drilling, not what this session unlocks.
    const complexity = this.tree.complexity();

    this.history.push(record);
    const application = this.model.applySession(record.keyTimes);
    const changeset = this.tree.update(this.model.symbols);

    const score = record.partial ? 0 : computeScore(summarizeSession(record.keyTimes), complexity);
    this.state.totalScore += score;
    this.state.totalSessions += 1;
    this.state.level = levelFromScore(this.state.totalScore);
    this.state.hesitationThresholdMs = application.hesitationThresholdMs;
    this.state.streak = recordPracticeDay(this.state.streak, now);
    this.state.lastChangeset = changeset;

    const previousFocus = this.state.focus;
    this.state.focus = this.computeFocus();

    if (application.prunedTrigrams > 0) {
      this.logger.info(`Pruned ${application.prunedTrigrams} three-symbol pairs`);
    }

    await this.persist();
    this.notify();

    return {
      changeset,
      focus: this.state.focus,
      focusChanged: !sameFocus(previousFocus, this.state.focus),
      score,
      hesitationThresholdMs: application.hesitationThresholdMs,
    };
  }

  /** Available -> in progress. Returns false when the branch is not available. */
  async startBranch(id: BranchId): Promise<boolean> {
    const started = this.tree.startBranch(id);
    if (!started) return false;

    // Level 0 may already be confident through symbols shared with other branches.
    this.state.lastChangeset = this.tree.update(this.model.symbols);
    this.state.focus = this.computeFocus();
    await this.saveProfile();
    this.notify();
    return true;
  }

  setScope(scope: DrillScope) {
    if (scope.kind === "branch") this.tree.branch(scope.branch);
    this.state.scope = scope;
    this.state.focus = this.computeFocus();
    this.notify();
  }

  /** Returns the transitions the new target caused; none before `init()`. */
  async setTargetWpm(wpm: number): Promise<SkillTreeChangeset> {
    if (!Number.isFinite(wpm) || wpm <= 0) {
      throw new ConfigError("Invalid target speed", [`targetWpm: expected a positive number, got ${wpm}`]);
    }
    this.config = { ...this.config, targetWpm: wpm };
    this.state.targetWpm = wpm;
    this.model.setTargetWpm(wpm);

    if (!this.state.isLoaded) return NO_CHANGES;

    // Target changed, confidences change
    const changeset = this.tree.update(this.model.symbols);
    this.state.lastChangeset = changeset;
    this.state.focus = this.computeFocus();
    await this.persist();
    this.notify();
    return changeset;
  }

  getFocus(): FocusSelection {
    return this.state.focus;
  }

  getPrimaryFocus(): FocusTarget | null {
    return primaryFocus(this.state.focus);
  }

  unlockedSymbols(scope: DrillScope = this.state.scope): KeySymbol[] {
    return this.tree.unlockedSymbols(scope);
  }

  getState(): Readonly<MasteryState> {
    return this.state;
  }

  getSkillTree(): SkillTree {
    return this.tree;
  }

  getSymbolStats(): SymbolStatsStore {
    return this.model.symbols;
  }

  getModel(): PracticeModel {
    return this.model;
  }

  getHistory(): readonly SessionRecord[] {
    return this.history;
  }

  subscribe(listener: Listener) {
    this.listeners.push(listener);
    listener(this.state);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private notify() {
    this.listeners.forEach((l) => l(this.state));
  }

  // ------------------------
  // Internals
  // ------------------------

  private computeFocus(): FocusSelection {
    return selectFocus(this.tree, this.state.scope, this.model.symbols, this.model.bigrams);
  }

  private normalizeKeyTimes(keyTimes: KeyTime[]): KeyTime[] {
    const normalized: KeyTime[] = [];
    for (const kt of keyTimes) {
      const key = normalizeSymbol(kt.key);
      if (key === null) {
        this.logger.warn("Dropping keystroke for unknown key:", kt.key);
        continue;
      }
      if (!Number.isFinite(kt.timeMs) || kt.timeMs < 0) {
        this.logger.warn(`Dropping keystroke for ${JSON.stringify(key)} with invalid time:`, kt.timeMs);
        continue;
      }
      normalized.push({ key, timeMs: kt.timeMs, correct: kt.correct });
    }
    return normalized;
  }

  private assertLoaded() {
    if (!this.state.isLoaded) {
      throw new Error("MasteryEngine.init() must complete before sessions are recorded");
    }
  }

  private async persist() {
    if (!this.storage) return;
    await Promise.all([
      this.saveProfile(),
      this.storage.saveSymbolStats({ schemaVersion: SCHEMA_VERSION, stats: this.model.symbols.toJSON() }),
      this.storage.saveHistory({ schemaVersion: SCHEMA_VERSION, sessions: this.history }),
    ]);
  }

  private async saveProfile() {
    if (!this.storage) return;
    await this.storage.saveProfile({
      schemaVersion: SCHEMA_VERSION,
      skillTree: this.tree.toJSON(),
      totalScore: this.state.totalScore,
      totalSessions: this.state.totalSessions,
      targetWpm: this.state.targetWpm,
      ...this.state.streak,
    });
  }
}
