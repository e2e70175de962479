import * as fs from 'node:fs/promises';
import type { DutyRoster, ResponsiblePerson } from '../types/adapters.js';
import { errorMessage } from '../types/errors.js';
import { logThought } from '../utils/logger.js';

const DAY_MS = 86_400_000;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

export interface DutyShift {
  name: string;
  userId: string;
  /** Epoch ms, inclusive. */
  startsAt: number;
  /** Epoch ms, exclusive. */
  endsAt: number;
}

export interface FileDutyRosterOptions {
  /** JSON shift file; without one the fallback user is always on duty. */
  rosterPath?: string;
  /** Pinged when no shift covers the current time. */
  fallbackUserId?: string;
  refreshMinutes?: number;
  clock?: () => number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Date-only bounds cover whole UTC days; `end` is inclusive of its day. */
function parseBound(value: unknown, isEnd: boolean): number | null {
  if (typeof value !== 'string') return null;
  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) return null;
  return isEnd && DATE_ONLY.test(value) ? parsed + DAY_MS : parsed;
}

/**
 * Parse a shift file: `{ "shifts": [{ "name", "userId", "start", "end" }] }`.
 * Malformed entries are skipped and counted.
 */
export function parseDutyRoster(raw: unknown): { shifts: DutyShift[]; skipped: number } {
  const entries = isRecord(raw) && Array.isArray(raw.shifts) ? raw.shifts : [];
  const shifts: DutyShift[] = [];
  let skipped = 0;

  for (const entry of entries) {
    if (!isRecord(entry) || typeof entry.name !== 'string' || typeof entry.userId !== 'string') {
      skipped += 1;
      continue;
    }
    const startsAt = parseBound(entry.start, false);
    const endsAt = parseBound(entry.end, true);
    if (startsAt === null || endsAt === null || endsAt <= startsAt) {
      skipped += 1;
      continue;
    }
    shifts.push({ name: entry.name, userId: entry.userId, startsAt, endsAt });
  }

  return { shifts, skipped };
}

/**
 * Duty roster backed by a JSON shift file.
 *
 * The file is re-read once the loaded copy is older than `refreshMinutes`. A
 * failed read keeps the previous shifts.
 */
export class FileDutyRoster implements DutyRoster {
  readonly #rosterPath: string | undefined;
  readonly #fallbackUserId: string | undefined;
  readonly #refreshMs: number;
  readonly #clock: () => number;
  #shifts: DutyShift[] = [];
  #loadedAt: number | null = null;

  constructor(options: FileDutyRosterOptions = {}) {
    this.#rosterPath = options.rosterPath || undefined;
    this.#fallbackUserId = options.fallbackUserId || undefined;
    this.#refreshMs = (options.refreshMinutes ?? 60) * 60_000;
    this.#clock = options.clock ?? (() => Date.now());
  }

  async currentResponsible(): Promise<ResponsiblePerson | null> {
    const now = this.#clock();
    if (this.#rosterPath && (this.#loadedAt === null || now - this.#loadedAt >= this.#refreshMs)) {
      await this.#reload(this.#rosterPath, now);
    }

    const shift = this.#shifts.find((candidate) => candidate.startsAt <= now && now < candidate.endsAt);
    if (shift) {
      return { userId: shift.userId, name: shift.name };
    }
    return this.#fallbackUserId ? { userId: this.#fallbackUserId, name: 'responsible' } : null;
  }

  async #reload(rosterPath: string, now: number): Promise<void> {
    // A broken file is retried on the refresh cadence too.
    this.#loadedAt = now;
    try {
      const parsed = parseDutyRoster(JSON.parse(await fs.readFile(rosterPath, 'utf8')));
      this.#shifts = parsed.shifts;
      void logThought(
        `[DutyRoster] Loaded ${parsed.shifts.length} shift(s) from ${rosterPath}` +
          (parsed.skipped > 0 ? `, skipped ${parsed.skipped} malformed.` : '.'),
      );
    } catch (err) {
      void logThought(`[DutyRoster] Could not read ${rosterPath}: ${errorMessage(err)}. Keeping previous shifts.`);
    }
  }
}
