/**
 * Sync State Management
 *
 * Persists sync metadata to ~/.orbitsync/sync-state.json
 * Tracks: last completed sync, last attempt, last error, failure streak
 */

import { existsSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { ensureConfigDir, getConfigDir } from "../config/config.js";

// --- Schema ---

export const SyncStateSchema = z.object({
  version: z.literal("1.0.0"),
  lastSyncAt: z.string().nullable(), // ISO timestamp of last completed sync
  lastAttemptAt: z.string().nullable(), // ISO timestamp of last started sync
  lastSyncError: z.string().nullable(), // Last error message if any
  consecutiveFailures: z.number().int().min(0),
});

export type SyncState = z.infer<typeof SyncStateSchema>;

function getSyncStateFile(dir: string): string {
  return join(dir, "sync-state.json");
}

// --- Factory ---

export function createEmptySyncState(): SyncState {
  return {
    version: "1.0.0",
    lastSyncAt: null,
    lastAttemptAt: null,
    lastSyncError: null,
    consecutiveFailures: 0,
  };
}

// --- Load / Save ---

export function loadSyncState(dir: string = getConfigDir()): SyncState {
  const stateFile = getSyncStateFile(dir);
  if (!existsSync(stateFile)) {
    return createEmptySyncState();
  }

  try {
    const data = readFileSync(stateFile, "utf-8");
    const parsed = SyncStateSchema.safeParse(JSON.parse(data));
    if (parsed.success) {
      return parsed.data;
    }
    // Invalid schema, return empty state
    return createEmptySyncState();
  } catch {
    // Parse error, return empty state
    return createEmptySyncState();
  }
}

export function saveSyncState(state: SyncState, dir: string = getConfigDir()): void {
  ensureConfigDir(dir);

  writeFileSync(getSyncStateFile(dir), JSON.stringify(state, null, 2), {
    mode: 0o600,
  });
}

// --- Mutation Helpers ---

export function markSyncStarted(state: SyncState, now: Date = new Date()): SyncState {
  return { ...state, lastAttemptAt: now.toISOString() };
}

export function markSyncComplete(state: SyncState, now: Date = new Date()): SyncState {
  return {
    ...state,
    lastSyncAt: now.toISOString(),
    lastSyncError: null,
    consecutiveFailures: 0,
  };
}

export function markSyncError(state: SyncState, error: string): SyncState {
  return {
    ...state,
    lastSyncError: error,
    consecutiveFailures: state.consecutiveFailures + 1,
  };
}

// --- Persistence Wrapper ---

/**
 * Storage used by the sync engine; file-backed by default, in-memory for tests.
 */
export interface SyncStateStore {
  load(): SyncState;
  save(state: SyncState): void;
}

export function createFileSyncStateStore(dir: string = getConfigDir()): SyncStateStore {
  return {
    load: () => loadSyncState(dir),
    save: (state) => saveSyncState(state, dir),
  };
}

export function createMemorySyncStateStore(initial: SyncState = createEmptySyncState()): SyncStateStore {
  let current = initial;
  return {
    load: () => current,
    save: (state) => {
      current = state;
    },
  };
}
