import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { errorMessage, isMissingFile } from "@/lib/errors";
import { logWarn } from "@/lib/log";
import type { DeliveryRecord, DeliveryState } from "@/lib/types";

const DAY_MS = 24 * 60 * 60 * 1000;

const legacySchema = z.array(z.string());
const currentSchema = z.record(z.string(), z.unknown());

/** The two on-disk shapes; only `current` is ever written. */
export type StoredState =
  | { format: "legacy"; ids: string[] }
  | { format: "current"; entries: Record<string, unknown> };

export type LoadedFormat = StoredState["format"] | "missing" | "corrupt";

export interface LoadedState {
  state: DeliveryState;
  format: LoadedFormat;
}

export interface PruneResult {
  state: DeliveryState;
  removed: number;
}

export class DeliveryStateStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<LoadedState> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return { state: new Map(), format: "missing" };
      }
      logWarn(`State file ${this.filePath} is unreadable, starting empty: ${errorMessage(error)}`);
      return { state: new Map(), format: "corrupt" };
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logWarn(`State file ${this.filePath} is not valid JSON, starting empty: ${errorMessage(error)}`);
      return { state: new Map(), format: "corrupt" };
    }

    const stored = decodeStoredState(json);
    if (!stored) {
      logWarn(`State file ${this.filePath} has an unknown shape, starting empty`);
      return { state: new Map(), format: "corrupt" };
    }
    return { state: toDeliveryState(stored), format: stored.format };
  }

  async save(state: DeliveryState): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, serializeState(state), "utf8");
  }
}

export function decodeStoredState(json: unknown): StoredState | null {
  const legacy = legacySchema.safeParse(json);
  if (legacy.success) {
    return { format: "legacy", ids: legacy.data };
  }
  const current = currentSchema.safeParse(json);
  if (current.success) {
    return { format: "current", entries: current.data };
  }
  return null;
}

export function toDeliveryState(stored: StoredState): DeliveryState {
  const state: DeliveryState = new Map();
  if (stored.format === "legacy") {
    for (const id of stored.ids) {
      state.set(id, { addedAt: null });
    }
    return state;
  }
  for (const [id, entry] of Object.entries(stored.entries)) {
    state.set(id, { addedAt: readAddedAt(entry) });
  }
  return state;
}

function readAddedAt(entry: unknown): string | null {
  if (typeof entry !== "object" || entry === null || !("added_at" in entry)) {
    return null;
  }
  return typeof entry.added_at === "string" ? entry.added_at : null;
}

export function serializeState(state: DeliveryState): string {
  const ids = Array.from(state.keys()).sort();
  const body: Record<string, { added_at: string | null }> = {};
  for (const id of ids) {
    body[id] = { added_at: state.get(id)?.addedAt ?? null };
  }
  return `${JSON.stringify(body, null, 2)}\n`;
}

// Date, optional `T`/space-separated time, optional `Z` or numeric offset.
const ISO_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2})(?::(\d{2})(?:\.(\d+))?)?)?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Parses an ISO-8601 timestamp, reading it as UTC when it carries no offset.
 * Anything else is unparseable and yields null, so that the entry is retained.
 */
export function parseTimestamp(value: string | null): number | null {
  if (!value) {
    return null;
  }
  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, date, clock = "00:00", seconds = "00", fraction = "", offset = "Z"] = match;
  const millis = fraction.padEnd(3, "0").slice(0, 3);
  const zone = offset === "Z" ? "Z" : `${offset.slice(0, 3)}:${offset.slice(-2)}`;
  const time = Date.parse(`${date}T${clock}:${seconds}.${millis}${zone}`);
  return Number.isNaN(time) ? null : time;
}

export function pruneState(state: DeliveryState, retentionDays: number, now: Date = new Date()): PruneResult {
  const cutoff = now.getTime() - retentionDays * DAY_MS;
  const kept: DeliveryState = new Map();
  let removed = 0;
  for (const [id, record] of state) {
    const time = parseTimestamp(record.addedAt);
    if (time !== null && time <= cutoff) {
      removed++;
      continue;
    }
    kept.set(id, record);
  }
  return { state: kept, removed };
}

export function recordDelivered(state: DeliveryState, ids: Iterable<string>, now: Date = new Date()): DeliveryState {
  const next: DeliveryState = new Map(state);
  const record: DeliveryRecord = { addedAt: now.toISOString() };
  for (const id of ids) {
    if (!next.has(id)) {
      next.set(id, { ...record });
    }
  }
  return next;
}
