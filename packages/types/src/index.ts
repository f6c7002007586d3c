export type KeySymbol = string; // one character, or a sentinel such as "\b"
export type PairId = string; // concatenated symbols, e.g. "th" or "ing"
export type BranchId = string;

export type PairOrder = 2 | 3;

export interface SymbolStat {
  filteredTimeMs: number; // EMA of correct keystroke time
  bestTimeMs: number;
  confidence: number; // targetTimeMs / filteredTimeMs
  sampleCount: number; // correct samples
  errorCount: number;
  totalCount: number;
  errorRateEma: number; // 0.5 prior until observed
  recentTimes: number[];
}

export interface PairStat {
  id: PairId;
  symbols: KeySymbol[];
  filteredTimeMs: number;
  bestTimeMs: number;
  confidence: number;
  sampleCount: number;
  errorCount: number;
  hesitationCount: number;
  errorRateEma: number;
  errorAnomalyStreak: number; // saturating, see STREAK_CAP
  speedAnomalyStreak: number;
  lastSeenIndex: number; // session ordinal
}

export type BranchStatus = "locked" | "available" | "in_progress" | "complete";

export interface BranchProgress {
  status: BranchStatus;
  currentLevel: number;
}

export type SkillTreeProgress = Record<BranchId, BranchProgress>;

export interface LevelDefinition {
  name: string;
  symbols: KeySymbol[];
}

export type UnlockMode = "levels" | "incremental";

export interface BranchDefinition {
  id: BranchId;
  name: string;
  unlock: UnlockMode;
  // Only for "incremental" branches: how many symbols are unlocked up front.
  initialSymbols?: number;
  levels: LevelDefinition[];
}

export interface SkillTreeDefinition {
  rootBranch: BranchId;
  branches: BranchDefinition[];
}

export type DrillScope = { kind: "global" } | { kind: "branch"; branch: BranchId };

export interface SkillTreeChangeset {
  newlyAvailable: BranchId[];
  newlyCompleted: BranchId[];
  allSymbolsUnlocked: boolean;
  allBranchesComplete: boolean;
}

export type AnomalyKind = "error" | "speed";

export interface PairAnomaly {
  id: PairId;
  symbols: KeySymbol[];
  kind: AnomalyKind;
  anomalyPercent: number;
}

export type PairFocus = PairAnomaly;

export interface FocusSelection {
  charFocus: KeySymbol | null;
  pairFocus: PairFocus | null;
}

export type FocusTarget =
  | { kind: "char"; symbol: KeySymbol }
  | { kind: "pair"; id: PairId; symbols: KeySymbol[] };

export interface KeyTime {
  key: KeySymbol;
  timeMs: number; // elapsed since the previous keystroke
  correct: boolean;
}

export interface SessionRecord {
  keyTimes: KeyTime[];
  partial: boolean;
  timestamp: string; // ISO 8601
}

export interface PairEvent {
  symbols: KeySymbol[];
  totalTimeMs: number;
  correct: boolean;
  hesitation: boolean;
}

export interface SessionSummary {
  cpm: number;
  incorrect: number;
  totalChars: number;
}

// Consecutive UTC days with at least one session.
export interface PracticeStreak {
  streakDays: number;
  bestStreak: number;
  lastPracticeDate: string | null; // YYYY-MM-DD
}

export interface ProfileData extends PracticeStreak {
  schemaVersion: number;
  skillTree: SkillTreeProgress;
  totalScore: number;
  totalSessions: number;
  targetWpm: number;
}

export interface SymbolStatsData {
  schemaVersion: number;
  stats: Record<KeySymbol, SymbolStat>;
}

export interface SessionHistoryData {
  schemaVersion: number;
  sessions: SessionRecord[];
}

// Persistence port. Pair statistics are never part of it: they are rebuilt
// from the session history on load.
export interface ProfileStorage {
  loadProfile(): Promise<ProfileData | null>;
  saveProfile(profile: ProfileData): Promise<void>;
  loadSymbolStats(): Promise<SymbolStatsData | null>;
  saveSymbolStats(data: SymbolStatsData): Promise<void>;
  loadHistory(): Promise<SessionHistoryData | null>;
  saveHistory(data: SessionHistoryData): Promise<void>;
}

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}
