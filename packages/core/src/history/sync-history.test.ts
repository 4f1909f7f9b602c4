import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { SYNC_HISTORY_FILENAME, SyncHistory } from "./sync-history.js";

describe("SyncHistory", () => {
  let dir: string;
  let clock: Date;
  const now = () => clock;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "orbitsync-history-test-"));
    clock = new Date("2026-07-01T03:00:00.000Z");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("records entries newest first with defaults", () => {
    const history = new SyncHistory({ now });
    history.recordSync({ action: "fullSync", status: "success", details: "Synced 1↓ 0↑", recordsDownloaded: 1 });
    clock = new Date("2026-07-01T04:00:00.000Z");
    history.recordSync({ action: "manualSync", status: "failed", details: "Sync failed", errorCode: "network" });

    expect(history.all.map((entry) => entry.action)).toEqual(["manualSync", "fullSync"]);
    expect(history.lastSync).toMatchObject({
      timestamp: "2026-07-01T04:00:00.000Z",
      status: "failed",
      recordsUploaded: 0,
      recordsDownloaded: 0,
      durationMs: 0,
      errorCode: "network",
    });
  });

  it("keeps a rolling window", () => {
    const history = new SyncHistory({ maxEntries: 3, now });
    for (let i = 0; i < 5; i++) {
      history.recordSync({ action: "backgroundSync", status: "success", details: `run ${i}` });
    }

    expect(history.all.map((entry) => entry.details)).toEqual(["run 4", "run 3", "run 2"]);
  });

  it("finds the last successful sync, counting partial success", () => {
    const history = new SyncHistory({ now });
    history.recordSync({ action: "fullSync", status: "success", details: "first" });
    history.recordSync({ action: "fullSync", status: "partialSuccess", details: "second" });
    history.recordSync({ action: "fullSync", status: "failed", details: "third" });

    expect(history.lastSuccessfulSync?.details).toBe("second");
    expect(history.entriesMatching("failed").map((entry) => entry.details)).toEqual(["third"]);
  });

  it("persists to the config directory and reloads", () => {
    const history = new SyncHistory({ dir, now });
    history.recordSync({ action: "conflictResolution", status: "success", details: "Synced 0↓ 4↑", recordsUploaded: 4 });

    const written = JSON.parse(readFileSync(join(dir, SYNC_HISTORY_FILENAME), "utf-8"));
    expect(written).toHaveLength(1);

    const reloaded = new SyncHistory({ dir, now });
    expect(reloaded.lastSync?.recordsUploaded).toBe(4);
    expect(reloaded.exportJSON()).toBe(history.exportJSON());
  });

  it("clears entries", () => {
    const history = new SyncHistory({ dir, now });
    history.recordSync({ action: "fullSync", status: "skipped", details: "Not signed in" });
    history.clear();

    expect(history.all).toEqual([]);
    expect(new SyncHistory({ dir, now }).all).toEqual([]);
  });

  it("starts empty from a malformed file", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    writeFileSync(join(dir, SYNC_HISTORY_FILENAME), '[{"id": 1}]');

    expect(new SyncHistory({ dir, now }).all).toEqual([]);
    errorSpy.mockRestore();
  });
});
