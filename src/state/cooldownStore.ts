import { existsSync, rmSync } from 'fs';
import { join } from 'path';
import { COOLDOWN_FILE } from '../config';
import { CooldownRecordSchema } from '../schemas/suggestion';
import { readJSON, writeJSONAtomic } from '../util/fileCache';
import { describeError, logger } from '../util/logger';

/** Single global cooldown between emitted suggestions. */
export interface CooldownStore {
  isCoolingDown(now: Date): boolean;
  recordSuggestion(now: Date): void;
}

export function isWithinCooldown(lastSuggestedAt: number | null, now: Date, cooldownSeconds: number): boolean {
  if (lastSuggestedAt === null) return false;
  return now.getTime() - lastSuggestedAt < cooldownSeconds * 1000;
}

export class MemoryCooldownStore implements CooldownStore {
  recordCount = 0;

  constructor(
    private readonly cooldownSeconds: number,
    private lastSuggestedAt: number | null = null
  ) {}

  isCoolingDown(now: Date): boolean {
    return isWithinCooldown(this.lastSuggestedAt, now, this.cooldownSeconds);
  }

  recordSuggestion(now: Date): void {
    this.lastSuggestedAt = now.getTime();
    this.recordCount++;
  }

  lastSuggestion(): number | null {
    return this.lastSuggestedAt;
  }
}

/**
 * Cooldown record kept as one JSON file. Reads fail open (a missing or corrupt
 * record means "no prior suggestion"); writes replace the file atomically.
 */
export class FileCooldownStore implements CooldownStore {
  readonly path: string;

  constructor(dir: string, private readonly cooldownSeconds: number) {
    this.path = join(dir, COOLDOWN_FILE);
  }

  lastSuggestion(): number | null {
    if (!existsSync(this.path)) return null;
    try {
      const parsed = CooldownRecordSchema.safeParse(readJSON(this.path));
      if (parsed.success) return parsed.data.lastSuggestedAt;
      logger.warn('Cooldown', `Ignoring malformed record in ${this.path}`);
    } catch (error) {
      logger.warn('Cooldown', `Ignoring unreadable record in ${this.path}: ${describeError(error)}`);
    }
    return null;
  }

  isCoolingDown(now: Date): boolean {
    const last = this.lastSuggestion();
    const cooling = isWithinCooldown(last, now, this.cooldownSeconds);
    if (cooling && last !== null) {
      const remaining = (this.cooldownSeconds * 1000 - (now.getTime() - last)) / 60000;
      logger.info('Cooldown', `In cooldown: ${remaining.toFixed(1)} minutes remaining`);
    }
    return cooling;
  }

  recordSuggestion(now: Date): void {
    writeJSONAtomic(this.path, { lastSuggestedAt: now.getTime() });
  }

  clear(): void {
    rmSync(this.path, { force: true });
  }
}
