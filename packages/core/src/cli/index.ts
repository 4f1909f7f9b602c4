#!/usr/bin/env node
/**
 * orbit - offline-first multi-device sync
 *
 * Usage:
 *   orbit status                          Sync status, pending changes, device
 *   orbit sync [--force]                  Sync now (--force skips the cooldown)
 *   orbit resolve this-device|cloud       Resolve a device conflict
 *   orbit devices                         List devices on this account
 *   orbit queue                           Show pending uploads
 *   orbit history [--json]                Show recent sync passes
 *   orbit auth login|logout|status        Manage the account session
 *   orbit daemon                          Run the daily background sync
 */

import "./env.js";
import { shutdownTelemetry } from "@orbitsync/telemetry";
import { errorMessage } from "../errors.js";
import type { SyncRunResult, SyncSkipReason } from "../engine/sync-engine.js";
import type { ConflictResolution } from "../engine/sync-status.js";
import { BackgroundSyncScheduler } from "../scheduler/background-sync.js";
import { cmdAuthHelp, cmdAuthLogin, cmdAuthLogout, cmdAuthStatus } from "./auth.js";
import { formatDevices, formatHistory, formatQueue, formatStatus } from "./format.js";
import { createRuntime } from "./runtime.js";

// --- Commands ---

async function cmdStatus(): Promise<void> {
  const runtime = await createRuntime();
  console.log(
    formatStatus({
      status: runtime.engine.status,
      lastSync: runtime.engine.lastSyncDate,
      pending: runtime.queue.size,
      overflowed: runtime.queue.isOverflowed,
      identity: runtime.identity,
      signedIn: await runtime.session.isSignedIn(),
    })
  );
}

function reportRun(result: SyncRunResult): void {
  if (result.outcome === "skipped") {
    const hints: Record<SyncSkipReason, string> = {
      signedOut: "Not signed in. Run: orbit auth login <email>",
      simulator: "Simulator devices do not sync.",
      cooldown: "Synced moments ago. Use --force to sync anyway.",
      busy: "Another sync is in progress.",
    };
    console.log(hints[result.reason]);
    return;
  }

  const { status } = result;
  switch (status.state) {
    case "conflictDetected": {
      const { otherDevice, localRecordCount } = status.info;
      console.log(`This account was last synced from ${otherDevice.deviceName} (${otherDevice.deviceType}).`);
      console.log(`This device has ${localRecordCount} local record(s).`);
      console.log("\nChoose which data to keep:");
      console.log("  orbit resolve this-device   Upload this device's data");
      console.log("  orbit resolve cloud         Replace local data with the cloud copy");
      process.exitCode = 2;
      return;
    }
    case "failed":
      console.error(`Sync failed: ${status.message}`);
      process.exitCode = 1;
      return;
    case "success":
    case "syncing":
    case "idle":
      console.log(status.state === "success" ? status.message : "Done.");
  }
}

async function cmdSync(force: boolean): Promise<void> {
  const { engine } = await createRuntime({ statusDisplayMs: 0 });
  reportRun(force ? await engine.forceSync() : await engine.performFullSyncSafely());
}

async function cmdResolve(choiceArg?: string): Promise<void> {
  const choices: Record<string, ConflictResolution> = {
    "this-device": "useThisDevice",
    cloud: "useCloudData",
  };
  const choice = choiceArg ? choices[choiceArg] : undefined;
  if (!choice) {
    console.error("Usage: orbit resolve this-device|cloud");
    process.exit(1);
  }

  const { engine } = await createRuntime({ statusDisplayMs: 0 });
  reportRun(await engine.handleConflictResolution(choice));
}

async function cmdDevices(): Promise<void> {
  const { remote, identity, session } = await createRuntime();
  if (!(await session.isSignedIn())) {
    console.log("Not signed in. Run: orbit auth login <email>");
    return;
  }
  console.log(formatDevices(await remote.fetchDeviceRegistry(), identity.deviceID));
}

async function cmdQueue(): Promise<void> {
  const { queue } = await createRuntime();
  console.log(formatQueue(queue.getPriorityQueue()));
  if (queue.isOverflowed) {
    console.log("\nQueue overflowed: the next sync uploads every local record.");
  }
}

async function cmdHistory(json: boolean): Promise<void> {
  const { history } = await createRuntime();
  console.log(json ? history.exportJSON() : formatHistory(history.all));
}

async function cmdDaemon(): Promise<void> {
  const runtime = await createRuntime({ connector: "daemon" });
  const scheduler = new BackgroundSyncScheduler(runtime.engine, {
    hour: runtime.config.backgroundSyncHour,
    history: runtime.history,
    keepAlive: true,
  });
  scheduler.start();

  const stop = (): void => {
    scheduler.stop();
    void shutdownTelemetry().finally(() => process.exit(0));
  };
  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);
}

function cmdHelp(): void {
  console.log(`
orbit - Offline-first sync across your devices

Sync:
  orbit status                          Show sync status and pending changes
  orbit sync                            Sync now (skipped within the cooldown)
  orbit sync --force                    Sync now, ignoring the cooldown
  orbit resolve this-device             Resolve a conflict keeping this device's data
  orbit resolve cloud                   Resolve a conflict keeping the cloud data

Inspect:
  orbit devices                         List devices registered on this account
  orbit queue                           Show records waiting to upload
  orbit history                         Show recent sync passes
  orbit history --json                  Export sync history as JSON

Account:
  orbit auth login <email> [password]   Sign in
  orbit auth logout                     Sign out
  orbit auth status                     Show authentication status

Background:
  orbit daemon                          Sync daily at the configured hour

Configuration lives in ~/.orbitsync/config.json (override with ORBITSYNC_HOME).
`);
}

// --- Main ---

function run(task: Promise<void>): void {
  void task
    .catch((e: unknown) => {
      console.error("Error:", errorMessage(e));
      process.exitCode = 1;
    })
    .finally(() => shutdownTelemetry());
}

const args = process.argv.slice(2);
const command = args[0];
const subcommand = args[1];

switch (command) {
  case "status":
    run(cmdStatus());
    break;
  case "sync":
    run(cmdSync(args.includes("--force")));
    break;
  case "resolve":
    run(cmdResolve(subcommand));
    break;
  case "devices":
    run(cmdDevices());
    break;
  case "queue":
    run(cmdQueue());
    break;
  case "history":
    run(cmdHistory(args.includes("--json")));
    break;
  case "auth":
    switch (subcommand) {
      case "login":
        run(cmdAuthLogin(args[2], args[3]));
        break;
      case "logout":
        run(cmdAuthLogout());
        break;
      case "status":
        run(cmdAuthStatus());
        break;
      default:
        cmdAuthHelp();
    }
    break;
  case "daemon":
    cmdDaemon().catch((e: unknown) => {
      console.error("Error:", errorMessage(e));
      process.exit(1);
    });
    break;
  default:
    cmdHelp();
}
