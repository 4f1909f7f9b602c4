/**
 * Sync Engine
 *
 * Drives one pass at a time through: registry fetch → conflict check →
 * reconcile → upload → device registration. Status transitions are published
 * to subscribers synchronously; any state other than idle blocks a new pass.
 *
 * Entry points never reject. Callers may ignore the returned promise
 * (fire-and-forget) or await it for the outcome.
 */

import { setTimeout as delay } from "timers/promises";
import type { TelemetryClient } from "@orbitsync/telemetry";
import { SyncErrorType, errorMessage, isSyncError } from "../errors.js";
import type { DeviceIdentity } from "../device/identity.js";
import { checkForConflict, registerDevice } from "../device/registry.js";
import type { SyncHistory, SyncAction } from "../history/sync-history.js";
import type { SyncQueueManager } from "../queue/sync-queue.js";
import type { ReconcileReport, RemoteSyncService, UploadReport } from "../remote/remote-sync.js";
import type { LocalRecordStore } from "../store/record-store.js";
import type { AccountSession } from "../supabase/client.js";
import {
  createMemorySyncStateStore,
  markSyncComplete,
  markSyncError,
  markSyncStarted,
  type SyncState,
  type SyncStateStore,
} from "./sync-state.js";
import { IDLE, type ConflictResolution, type SyncStatus } from "./sync-status.js";

export const DEFAULT_COOLDOWN_MS = 30_000;
export const DEFAULT_STATUS_DISPLAY_MS = 3_000;

export type SyncTelemetry = Pick<
  TelemetryClient,
  "trackSyncCompleted" | "trackSyncFailed" | "trackConflictDetected" | "trackConflictResolved"
>;

export interface SyncEngineDeps {
  remote: RemoteSyncService;
  queue: SyncQueueManager;
  store: LocalRecordStore;
  identity: DeviceIdentity;
  session: AccountSession;
  state?: SyncStateStore;
  history?: SyncHistory;
  telemetry?: SyncTelemetry;
}

export interface SyncEngineOptions {
  /** Minimum time since the last completed sync for performFullSyncSafely */
  cooldownMs?: number;
  /** How long success/failed stay visible before reverting to idle */
  statusDisplayMs?: number;
  now?: () => Date;
}

export type SyncSkipReason = "signedOut" | "simulator" | "cooldown" | "busy";

export type SyncRunResult =
  | { outcome: "skipped"; reason: SyncSkipReason }
  | { outcome: "completed"; status: SyncStatus };

export type SyncStatusListener = (status: SyncStatus) => void;

interface PassCounts {
  uploaded: number;
  downloaded: number;
  failed: number;
}

export class SyncEngine {
  private readonly deps: SyncEngineDeps;
  private readonly state: SyncStateStore;
  private readonly cooldownMs: number;
  private readonly statusDisplayMs: number;
  private readonly now: () => Date;
  private readonly listeners = new Set<SyncStatusListener>();
  private current: SyncStatus = IDLE;
  private running = false;

  constructor(deps: SyncEngineDeps, options: SyncEngineOptions = {}) {
    this.deps = deps;
    this.state = deps.state ?? createMemorySyncStateStore();
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.statusDisplayMs = options.statusDisplayMs ?? DEFAULT_STATUS_DISPLAY_MS;
    this.now = options.now ?? (() => new Date());
  }

  // --- Observation ---

  get status(): SyncStatus {
    return this.current;
  }

  get lastSyncDate(): Date | null {
    const { lastSyncAt } = this.state.load();
    return lastSyncAt ? new Date(lastSyncAt) : null;
  }

  /**
   * Receive every status transition. Returns an unsubscribe function.
   */
  subscribe(listener: SyncStatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private setStatus(status: SyncStatus): void {
    this.current = status;
    for (const listener of this.listeners) {
      try {
        listener(status);
      } catch (err) {
        console.error("[SyncEngine] Status listener threw:", err);
      }
    }
  }

  // --- Entry Points ---

  /**
   * Guarded sync: skipped when signed out, on a simulator, within the
   * cooldown of the last completed sync, or while another pass is active.
   */
  performFullSyncSafely(action: SyncAction = "fullSync"): Promise<SyncRunResult> {
    return this.start(action, true, () => this.executeSync(action));
  }

  /**
   * Same guards as performFullSyncSafely except the cooldown.
   */
  forceSync(action: SyncAction = "manualSync"): Promise<SyncRunResult> {
    return this.start(action, false, () => this.executeSync(action));
  }

  /**
   * Settle a detected conflict. Both choices end by registering this device
   * so the same conflict does not trigger again.
   */
  handleConflictResolution(choice: ConflictResolution): Promise<SyncRunResult> {
    return this.start("conflictResolution", false, () => this.executeResolution(choice));
  }

  /**
   * Leave the conflict unresolved and return to idle. Data is untouched; the
   * conflict will be detected again on the next pass.
   */
  dismissConflict(): boolean {
    if (this.current.state !== "conflictDetected") return false;
    console.log("[SyncEngine] Conflict dismissed");
    this.setStatus(IDLE);
    return true;
  }

  private async start(
    action: SyncAction,
    throttle: boolean,
    pass: () => Promise<SyncStatus>
  ): Promise<SyncRunResult> {
    const blocked = this.checkGuards(action, throttle);
    if (blocked) {
      return { outcome: "skipped", reason: blocked };
    }

    // Claimed synchronously so a second caller in the same tick is blocked
    this.running = true;
    try {
      if (!(await this.isSignedIn())) {
        console.log(`[SyncEngine] ${action} skipped: not signed in`);
        return { outcome: "skipped", reason: "signedOut" };
      }

      const status = await pass();
      await this.holdResult(status);
      return { outcome: "completed", status };
    } finally {
      this.running = false;
    }
  }

  private checkGuards(action: SyncAction, throttle: boolean): SyncSkipReason | null {
    if (this.deps.identity.isSimulator) {
      console.log(`[SyncEngine] ${action} skipped: simulator device`);
      return "simulator";
    }

    // A pending conflict only admits its resolution
    const resolvable = action === "conflictResolution" && this.current.state === "conflictDetected";
    if (this.running || (this.current.state !== "idle" && !resolvable)) {
      console.log(`[SyncEngine] ${action} skipped: engine is ${this.current.state}`);
      return "busy";
    }

    if (throttle) {
      const last = this.lastSyncDate;
      if (last && this.now().getTime() - last.getTime() < this.cooldownMs) {
        console.log(`[SyncEngine] ${action} skipped: last sync ${last.toISOString()} within cooldown`);
        return "cooldown";
      }
    }

    return null;
  }

  private async isSignedIn(): Promise<boolean> {
    try {
      return await this.deps.session.isSignedIn();
    } catch (err) {
      console.error("[SyncEngine] Session check failed:", err);
      return false;
    }
  }

  private async holdResult(status: SyncStatus): Promise<void> {
    if (status.state !== "success" && status.state !== "failed") return;

    if (this.statusDisplayMs > 0) {
      await delay(this.statusDisplayMs);
    }
    if (this.current === status) {
      this.setStatus(IDLE);
    }
  }

  // --- Passes ---

  private async executeSync(action: SyncAction): Promise<SyncStatus> {
    const startedAt = this.now();
    this.beginPass("Checking devices...", startedAt);
    const { remote, queue, store, identity } = this.deps;

    try {
      const registry = await remote.fetchDeviceRegistry();
      const check = checkForConflict(registry, identity.deviceID);
      if (check.conflict) {
        const info = { otherDevice: check.otherDevice, localRecordCount: await store.count() };
        console.log(`[SyncEngine] Conflict with ${info.otherDevice.deviceName} (${info.otherDevice.deviceID})`);
        this.deps.history?.recordSync({
          action,
          status: "cancelled",
          details: `Conflict with ${info.otherDevice.deviceName}`,
          durationMs: this.elapsed(startedAt),
        });
        this.deps.telemetry?.trackConflictDetected(info.otherDevice.deviceType, info.localRecordCount);
        const status: SyncStatus = { state: "conflictDetected", info };
        this.setStatus(status);
        return status;
      }

      this.setStatus({ state: "syncing", message: "Downloading changes..." });
      const reconcile = await remote.reconcileFromRemote(store);

      this.setStatus({ state: "syncing", message: "Uploading changes..." });
      const upload = queue.isOverflowed
        ? await remote.uploadAllRecords(store, queue)
        : await remote.uploadPendingRecords(queue, store);

      await this.commitRegistration();
      return this.finishSuccess(action, countsOf(reconcile, upload), startedAt);
    } catch (err) {
      return this.finishFailure(action, err, startedAt);
    }
  }

  private async executeResolution(choice: ConflictResolution): Promise<SyncStatus> {
    const startedAt = this.now();
    const { remote, queue, store } = this.deps;

    try {
      let counts: PassCounts;
      if (choice === "useThisDevice") {
        this.beginPass("Uploading this device's data...", startedAt);
        counts = countsOf(undefined, await remote.uploadAllRecords(store, queue));
      } else {
        this.beginPass("Downloading cloud data...", startedAt);
        counts = countsOf(await remote.replaceLocalWithRemote(store, queue), undefined);
      }

      await this.commitRegistration();
      this.deps.telemetry?.trackConflictResolved(choice, true);
      return this.finishSuccess("conflictResolution", counts, startedAt);
    } catch (err) {
      this.deps.telemetry?.trackConflictResolved(choice, false);
      return this.finishFailure("conflictResolution", err, startedAt);
    }
  }

  private beginPass(message: string, startedAt: Date): void {
    this.setStatus({ state: "syncing", message });
    this.saveState((state) => markSyncStarted(state, startedAt));
  }

  /**
   * Registers against a freshly fetched registry so devices that registered
   * during this pass are kept.
   */
  private async commitRegistration(): Promise<void> {
    const { remote, identity } = this.deps;
    this.setStatus({ state: "syncing", message: "Registering device..." });
    const latest = await remote.fetchDeviceRegistry();
    await remote.updateDeviceRegistry(registerDevice(latest, identity.toDict(), this.now()));
  }

  private finishSuccess(action: SyncAction, counts: PassCounts, startedAt: Date): SyncStatus {
    const completedAt = this.now();
    this.saveState((state) => markSyncComplete(state, completedAt));

    const message = summarize(counts);
    const durationMs = this.elapsed(startedAt);
    console.log(`[SyncEngine] ${action}: ${message} in ${durationMs}ms`);

    this.deps.history?.recordSync({
      action,
      status: counts.failed > 0 ? "partialSuccess" : "success",
      details: message,
      recordsUploaded: counts.uploaded,
      recordsDownloaded: counts.downloaded,
      durationMs,
    });
    this.deps.telemetry?.trackSyncCompleted(action, counts, durationMs);

    const status: SyncStatus = { state: "success", message };
    this.setStatus(status);
    return status;
  }

  private finishFailure(action: SyncAction, err: unknown, startedAt: Date): SyncStatus {
    const message = errorMessage(err);
    const errorType = isSyncError(err) ? err.type : SyncErrorType.UNKNOWN;
    const durationMs = this.elapsed(startedAt);
    console.error(`[SyncEngine] ${action} failed (${errorType}): ${message}`);

    this.saveState((state) => markSyncError(state, message));
    this.deps.history?.recordSync({
      action,
      status: "failed",
      details: "Sync failed",
      durationMs,
      errorCode: errorType,
      errorMessage: message,
    });
    this.deps.telemetry?.trackSyncFailed(action, errorType, durationMs);

    const status: SyncStatus = { state: "failed", message };
    this.setStatus(status);
    return status;
  }

  private saveState(update: (state: SyncState) => SyncState): void {
    try {
      this.state.save(update(this.state.load()));
    } catch (err) {
      console.error("[SyncEngine] Failed to persist sync state:", err);
    }
  }

  private elapsed(startedAt: Date): number {
    return Math.max(0, this.now().getTime() - startedAt.getTime());
  }
}

function countsOf(reconcile: ReconcileReport | undefined, upload: UploadReport | undefined): PassCounts {
  return {
    downloaded: reconcile?.merged ?? 0,
    uploaded: upload?.uploaded ?? 0,
    failed: (reconcile?.failed ?? 0) + (upload?.failed ?? 0),
  };
}

/**
 * "Synced 2↓ 5↑", "Up to date", with " (1 failed)" on partial failure.
 */
export function summarize(counts: PassCounts): string {
  const { downloaded, uploaded, failed } = counts;
  if (downloaded === 0 && uploaded === 0 && failed === 0) {
    return "Up to date";
  }
  const base = `Synced ${downloaded}↓ ${uploaded}↑`;
  return failed > 0 ? `${base} (${failed} failed)` : base;
}
