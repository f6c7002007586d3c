import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import type { z } from "zod";
import type { Logger, ProfileData, ProfileStorage, SessionHistoryData, SymbolStatsData } from "@keyladder/types";
import { type EngineConfig, resolveConfig } from "@keyladder/core";
import { SCHEMA_VERSION, profileSchema, sessionHistorySchema, symbolStatsSchema } from "./schema";

const PROFILE_FILE = "profile.json";
const SYMBOL_STATS_FILE = "symbol_stats.json";
const HISTORY_FILE = "session_history.json";

let tmpCounter = 0;

export function defaultDataDir(): string {
  const base = process.env.XDG_DATA_HOME || join(homedir(), ".local", "share");
  return join(base, "keyladder");
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Profile, symbol statistics and session history as JSON files in one
 * directory. Writes go through a temporary file and a rename, so a crash never
 * leaves a half-written file behind.
 */
export class JsonFileStorage implements ProfileStorage {
  readonly baseDir: string;
  private logger: Logger;
  private pendingWrites = new Map<string, Promise<void>>();

  constructor(baseDir: string = defaultDataDir(), logger: Logger = console) {
    this.baseDir = baseDir;
    this.logger = logger;
  }

  async init(): Promise<void> {
    await mkdir(this.baseDir, { recursive: true });
  }

  loadProfile(): Promise<ProfileData | null> {
    return this.load(PROFILE_FILE, profileSchema);
  }

  saveProfile(profile: ProfileData): Promise<void> {
    return this.save(PROFILE_FILE, profile);
  }

  loadSymbolStats(): Promise<SymbolStatsData | null> {
    return this.load(SYMBOL_STATS_FILE, symbolStatsSchema);
  }

  saveSymbolStats(data: SymbolStatsData): Promise<void> {
    return this.save(SYMBOL_STATS_FILE, data);
  }

  loadHistory(): Promise<SessionHistoryData | null> {
    return this.load(HISTORY_FILE, sessionHistorySchema);
  }

  saveHistory(data: SessionHistoryData): Promise<void> {
    return this.save(HISTORY_FILE, data);
  }

  private async load<T extends { schemaVersion: number }>(
    name: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T | null> {
    const raw = await this.readJson(name);
    if (raw === undefined) return null;

    const result = schema.safeParse(raw);
    if (!result.success) {
      this.logger.warn(`Ignoring unreadable ${name}:`, result.error.issues[0]?.message);
      return null;
    }
    if (result.data.schemaVersion !== SCHEMA_VERSION) {
      this.logger.info(
        `Resetting ${name}: schema version ${result.data.schemaVersion}, expected ${SCHEMA_VERSION}`
      );
      return null;
    }
    return result.data;
  }

  private async readJson(name: string): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(join(this.baseDir, name), "utf8");
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      this.logger.warn(`Ignoring corrupt ${name}:`, error instanceof Error ? error.message : error);
      return undefined;
    }
  }

  // Writes to one file run in call order, so the last save always wins.
  private save(name: string, data: unknown): Promise<void> {
    const content = JSON.stringify(data, null, 2);
    const previous = this.pendingWrites.get(name) ?? Promise.resolve();
    // A failed earlier write was already reported to its own caller.
    const next = previous.catch(() => undefined).then(() => this.writeAtomically(name, content));
    this.pendingWrites.set(name, next);
    return next;
  }

  private async writeAtomically(name: string, content: string) {
    await this.init();
    const path = join(this.baseDir, name);
    tmpCounter += 1;
    const tmpPath = `${path}.${process.pid}.${tmpCounter}.tmp`;
    await writeFile(tmpPath, content, "utf8");
    await rename(tmpPath, path);
  }
}

/** Reads an engine config JSON file; a missing file yields the defaults. */
export async function loadEngineConfig(path: string): Promise<EngineConfig> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return resolveConfig({});
    throw error;
  }
  return resolveConfig(JSON.parse(content));
}
