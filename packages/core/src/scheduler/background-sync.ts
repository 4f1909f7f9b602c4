/**
 * Background Sync Scheduler
 *
 * One sync per day at a fixed local hour. Each run is recorded in the sync
 * history and schedules the next one. Timers do not keep the process alive on
 * their own.
 */

import type { SyncEngine, SyncSkipReason } from "../engine/sync-engine.js";
import type { SyncHistory } from "../history/sync-history.js";

export const DEFAULT_BACKGROUND_SYNC_HOUR = 3;

/**
 * Today's slot at `hour` if it is still ahead of `now`, else tomorrow's.
 */
export function computeNextRun(now: Date, hour: number = DEFAULT_BACKGROUND_SYNC_HOUR): Date {
  const next = new Date(now);
  next.setHours(hour, 0, 0, 0);
  if (next.getTime() <= now.getTime()) {
    next.setDate(next.getDate() + 1);
  }
  return next;
}

export interface BackgroundSyncOptions {
  hour?: number;
  history?: SyncHistory;
  now?: () => Date;
  /** Keep the event loop alive while waiting (the daemon wants this) */
  keepAlive?: boolean;
}

export class BackgroundSyncScheduler {
  private readonly hour: number;
  private readonly now: () => Date;
  private readonly keepAlive: boolean;
  private timer: NodeJS.Timeout | null = null;
  private nextRun: Date | null = null;

  constructor(
    private readonly engine: SyncEngine,
    private readonly options: BackgroundSyncOptions = {}
  ) {
    this.hour = options.hour ?? DEFAULT_BACKGROUND_SYNC_HOUR;
    this.now = options.now ?? (() => new Date());
    this.keepAlive = options.keepAlive ?? false;
  }

  get scheduledFor(): Date | null {
    return this.nextRun;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): Date {
    this.stop();
    const now = this.now();
    const next = computeNextRun(now, this.hour);
    this.nextRun = next;

    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runOnce().finally(() => {
        if (this.nextRun !== null) this.start();
      });
    }, next.getTime() - now.getTime());
    if (!this.keepAlive) {
      this.timer.unref();
    }

    console.log(`[BackgroundSync] Next sync scheduled for ${next.toISOString()}`);
    return next;
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextRun = null;
  }

  /**
   * Run one background pass. Skips are recorded; completed passes record
   * their own history entry in the engine.
   */
  async runOnce(): Promise<void> {
    const result = await this.engine.forceSync("backgroundSync");
    if (result.outcome === "skipped") {
      console.log(`[BackgroundSync] Skipped: ${result.reason}`);
      this.options.history?.recordSync({
        action: "backgroundSync",
        status: "skipped",
        details: skipDetails(result.reason),
      });
    }
  }
}

function skipDetails(reason: SyncSkipReason): string {
  switch (reason) {
    case "signedOut":
      return "Not signed in";
    case "simulator":
      return "Simulator device";
    case "cooldown":
      return "Synced recently";
    case "busy":
      return "Another sync in progress";
  }
}
