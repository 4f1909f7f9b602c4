import { describe, it, expect, beforeEach, vi } from "vitest";
import { DeviceIdentity } from "../device/identity.js";
import { DeviceRegistrySchema } from "../device/registry.js";
import { SyncError, SyncErrorType } from "../errors.js";
import { SyncHistory } from "../history/sync-history.js";
import { MemoryQueueStorage } from "../queue/queue-storage.js";
import { SyncQueueManager } from "../queue/sync-queue.js";
import { HabitTemplate } from "../records/habit-template.js";
import { MemoryObjectStore } from "../remote/object-store.js";
import { RemoteSyncService } from "../remote/remote-sync.js";
import { parseSyncJSON } from "../schema/record.js";
import { RecordRepository } from "../store/record-repository.js";
import { MemoryRecordStore } from "../store/record-store.js";
import { createStaticSession } from "../supabase/client.js";
import { SyncEngine, summarize, type SyncTelemetry } from "./sync-engine.js";
import { createMemorySyncStateStore } from "./sync-state.js";
import { IDLE, type SyncStatus } from "./sync-status.js";

const USER = "user-1";
const REGISTRY_KEY = `${USER}/device_registry.json`;

let clock: Date;
const now = () => clock;

function advance(ms: number): void {
  clock = new Date(clock.getTime() + ms);
}

/** Object store with switchable transfer failures */
class FlakyObjectStore extends MemoryObjectStore {
  failUploads: string[] = [];
  failDownloads = false;

  override async download(key: string): Promise<string | null> {
    if (this.failDownloads) {
      throw new SyncError("offline", SyncErrorType.NETWORK, true);
    }
    return super.download(key);
  }

  override async upload(key: string, body: string): Promise<void> {
    if (this.failUploads.some((fragment) => key.includes(fragment))) {
      throw new SyncError(`rejected ${key}`, SyncErrorType.STORAGE, true);
    }
    return super.upload(key, body);
  }
}

interface DeviceOptions {
  deviceID: string;
  deviceName: string;
  isSimulator?: boolean;
  signedIn?: boolean;
  maxQueueSize?: number;
  statusDisplayMs?: number;
}

function createTelemetry() {
  return {
    trackSyncCompleted: vi.fn(),
    trackSyncFailed: vi.fn(),
    trackConflictDetected: vi.fn(),
    trackConflictResolved: vi.fn(),
  };
}

async function createDevice(objects: MemoryObjectStore, options: DeviceOptions) {
  const store = new MemoryRecordStore();
  const queue = await SyncQueueManager.open(new MemoryQueueStorage(), { now, maxSize: options.maxQueueSize });
  const remote = new RemoteSyncService(objects, { root: USER, sleep: async () => {}, now });
  const identity = new DeviceIdentity({
    deviceID: options.deviceID,
    deviceName: options.deviceName,
    deviceType: "phone",
    isSimulator: options.isSimulator ?? false,
  });
  const history = new SyncHistory({ now });
  const state = createMemorySyncStateStore();
  const telemetry = createTelemetry();
  const sink: SyncTelemetry = telemetry;
  const engine = new SyncEngine(
    {
      remote,
      queue,
      store,
      identity,
      session: createStaticSession(options.signedIn === false ? null : USER),
      state,
      history,
      telemetry: sink,
    },
    { statusDisplayMs: options.statusDisplayMs ?? 0, now }
  );
  const repository = new RecordRepository(store, queue, now);

  return { engine, store, queue, history, state, telemetry, repository };
}

function habit(title: string): HabitTemplate {
  return new HabitTemplate({ title, baseTime: clock, createdAt: clock });
}

function readRegistry(objects: MemoryObjectStore) {
  return objects.download(REGISTRY_KEY).then((body) => (body === null ? null : DeviceRegistrySchema.parse(parseSyncJSON(body))));
}

beforeEach(() => {
  clock = new Date("2026-07-01T10:00:00.000Z");
});

describe("summarize", () => {
  it("formats pass counts", () => {
    expect(summarize({ downloaded: 0, uploaded: 0, failed: 0 })).toBe("Up to date");
    expect(summarize({ downloaded: 2, uploaded: 5, failed: 0 })).toBe("Synced 2↓ 5↑");
    expect(summarize({ downloaded: 0, uploaded: 1, failed: 1 })).toBe("Synced 0↓ 1↑ (1 failed)");
  });
});

describe("SyncEngine guards", () => {
  it("skips when signed out without touching the remote", async () => {
    const objects = new MemoryObjectStore(now);
    const device = await createDevice(objects, { deviceID: "device-a", deviceName: "Phone A", signedIn: false });

    const result = await device.engine.performFullSyncSafely();

    expect(result).toEqual({ outcome: "skipped", reason: "signedOut" });
    expect(device.engine.status).toEqual(IDLE);
    expect(objects.size).toBe(0);
  });

  it("skips on a simulator", async () => {
    const objects = new MemoryObjectStore(now);
    const device = await createDevice(objects, { deviceID: "sim", deviceName: "Simulator", isSimulator: true });

    expect(await device.engine.forceSync()).toEqual({ outcome: "skipped", reason: "simulator" });
    expect(objects.size).toBe(0);
  });

  it("blocks a second pass started in the same tick", async () => {
    const objects = new MemoryObjectStore(now);
    const device = await createDevice(objects, { deviceID: "device-a", deviceName: "Phone A" });

    const first = device.engine.forceSync();
    const second = await device.engine.forceSync();
    const completed = await first;

    expect(second).toEqual({ outcome: "skipped", reason: "busy" });
    expect(completed).toEqual({ outcome: "completed", status: { state: "success", message: "Up to date" } });
  });

  it("throttles the guarded entry point within the cooldown but not forceSync", async () => {
    const objects = new MemoryObjectStore(now);
    const device = await createDevice(objects, { deviceID: "device-a", deviceName: "Phone A" });

    await device.engine.performFullSyncSafely();
    expect(device.engine.lastSyncDate).toEqual(clock);

    advance(10_000);
    expect(await device.engine.performFullSyncSafely()).toEqual({ outcome: "skipped", reason: "cooldown" });
    expect((await device.engine.forceSync()).outcome).toBe("completed");

    advance(31_000);
    expect((await device.engine.performFullSyncSafely()).outcome).toBe("completed");
  });
});

describe("SyncEngine passes", () => {
  it("publishes every transition of a first-device sync", async () => {
    const objects = new MemoryObjectStore(now);
    const device = await createDevice(objects, { deviceID: "device-a", deviceName: "Phone A" });
    await device.repository.insert(habit("Stretch"));

    const seen: SyncStatus[] = [];
    const unsubscribe = device.engine.subscribe((status) => seen.push(status));
    await device.engine.performFullSyncSafely();
    unsubscribe();

    expect(seen).toEqual([
      { state: "syncing", message: "Checking devices..." },
      { state: "syncing", message: "Downloading changes..." },
      { state: "syncing", message: "Uploading changes..." },
      { state: "syncing", message: "Registering device..." },
      { state: "success", message: "Synced 0↓ 1↑" },
      IDLE,
    ]);

    await device.engine.forceSync();
    expect(seen).toHaveLength(6);
  });

  it("keeps going when a listener throws", async () => {
    const objects = new MemoryObjectStore(now);
    const device = await createDevice(objects, { deviceID: "device-a", deviceName: "Phone A" });
    device.engine.subscribe(() => {
      throw new Error("listener broke");
    });

    const result = await device.engine.forceSync();

    expect(result).toEqual({ outcome: "completed", status: { state: "success", message: "Up to date" } });
  });

  it("holds a result visible before returning to idle", async () => {
    const objects = new MemoryObjectStore(now);
    const device = await createDevice(objects, { deviceID: "device-a", deviceName: "Phone A", statusDisplayMs: 300 });

    const run = device.engine.forceSync();
    await vi.waitFor(() => expect(device.engine.status).toEqual({ state: "success", message: "Up to date" }), {
      interval: 5,
    });
    await run;

    expect(device.engine.status).toEqual(IDLE);
  });

  it("registers the first device as primary and reports completion", async () => {
    const objects = new MemoryObjectStore(now);
    const device = await createDevice(objects, { deviceID: "device-a", deviceName: "Phone A" });
    await device.repository.insert(habit("Stretch"));
    await device.repository.insert(habit("Read"));

    await device.engine.performFullSyncSafely();

    const registry = await readRegistry(objects);
    expect(registry?.registeredDevices).toEqual([
      {
        deviceID: "device-a",
        deviceName: "Phone A",
        deviceType: "phone",
        isSimulator: false,
        firstSyncDate: "2026-07-01T10:00:00.000Z",
        lastSyncDate: "2026-07-01T10:00:00.000Z",
        isPrimary: true,
      },
    ]);
    expect(device.queue.size).toBe(0);
    expect(device.history.lastSync).toMatchObject({
      action: "fullSync",
      status: "success",
      details: "Synced 0↓ 2↑",
      recordsUploaded: 2,
      recordsDownloaded: 0,
    });
    expect(device.telemetry.trackSyncCompleted).toHaveBeenCalledWith(
      "fullSync",
      { downloaded: 0, uploaded: 2, failed: 0 },
      0
    );
    expect(device.state.load()).toMatchObject({
      lastSyncAt: "2026-07-01T10:00:00.000Z",
      lastSyncError: null,
      consecutiveFailures: 0,
    });
  });

  it("fails the pass, records the error and returns to idle", async () => {
    const objects = new FlakyObjectStore(now);
    const device = await createDevice(objects, { deviceID: "device-a", deviceName: "Phone A" });
    await device.repository.insert(habit("Stretch"));
    objects.failDownloads = true;

    const result = await device.engine.forceSync();

    expect(result).toEqual({ outcome: "completed", status: { state: "failed", message: "offline" } });
    expect(device.engine.status).toEqual(IDLE);
    expect(device.queue.size).toBe(1);
    expect(device.history.lastSync).toMatchObject({
      action: "manualSync",
      status: "failed",
      errorCode: "network",
      errorMessage: "offline",
    });
    expect(device.telemetry.trackSyncFailed).toHaveBeenCalledWith("manualSync", "network", 0);
    expect(device.state.load()).toMatchObject({ lastSyncError: "offline", consecutiveFailures: 1 });
    expect(device.engine.lastSyncDate).toBeNull();
  });

  it("does not register the device when every upload fails", async () => {
    const objects = new FlakyObjectStore(now);
    const device = await createDevice(objects, { deviceID: "device-a", deviceName: "Phone A" });
    await device.repository.insert(habit("Stretch"));
    objects.failUploads = ["/records/"];

    const result = await device.engine.forceSync();

    expect(result).toEqual({
      outcome: "completed",
      status: { state: "failed", message: "All 1 record uploads failed" },
    });
    expect(await readRegistry(objects)).toBeNull();
    expect(device.queue.size).toBe(1);
  });

  it("reports a partial success and keeps the failed record queued", async () => {
    const objects = new FlakyObjectStore(now);
    const device = await createDevice(objects, { deviceID: "device-a", deviceName: "Phone A" });
    const kept = await device.repository.insert(habit("Stretch"));
    const rejected = await device.repository.insert(habit("Read"));
    objects.failUploads = [rejected.syncID];

    const result = await device.engine.forceSync();

    expect(result).toEqual({
      outcome: "completed",
      status: { state: "success", message: "Synced 0↓ 1↑ (1 failed)" },
    });
    expect(device.history.lastSync?.status).toBe("partialSuccess");
    expect(device.queue.queue.map((item) => item.syncID)).toEqual([rejected.syncID]);
    expect(objects.keys()).toContain(`${USER}/records/HabitTemplate_${kept.syncID}.json`);
    expect((await readRegistry(objects))?.registeredDevices.map((d) => d.deviceID)).toEqual(["device-a"]);
  });

  it("uploads everything after the queue overflowed", async () => {
    const objects = new MemoryObjectStore(now);
    const device = await createDevice(objects, { deviceID: "device-a", deviceName: "Phone A", maxQueueSize: 1 });
    await device.repository.insert(habit("Stretch"));
    await device.repository.insert(habit("Read"));
    expect(device.queue.isOverflowed).toBe(true);
    expect(device.queue.size).toBe(1);

    const result = await device.engine.forceSync();

    expect(result).toEqual({ outcome: "completed", status: { state: "success", message: "Synced 0↓ 2↑" } });
    expect(device.queue.isOverflowed).toBe(false);
    expect(device.queue.size).toBe(0);
  });
});

describe("SyncEngine across two devices", () => {
  async function seedTwoDevices() {
    const objects = new MemoryObjectStore(now);
    const a = await createDevice(objects, { deviceID: "device-a", deviceName: "Phone A" });
    const b = await createDevice(objects, { deviceID: "device-b", deviceName: "Tablet B" });

    const stretch = await a.repository.insert(habit("Stretch"));
    const read = await a.repository.insert(habit("Read"));
    await a.engine.performFullSyncSafely();

    advance(60_000);
    const local = await b.repository.insert(habit("Journal"));

    return { objects, a, b, stretch, read, local };
  }

  it("detects a conflict on a new device and waits for a decision", async () => {
    const { objects, b } = await seedTwoDevices();
    const keysBefore = objects.keys();

    const result = await b.engine.performFullSyncSafely();

    expect(result.outcome).toBe("completed");
    expect(b.engine.status.state).toBe("conflictDetected");
    if (b.engine.status.state === "conflictDetected") {
      expect(b.engine.status.info.otherDevice.deviceID).toBe("device-a");
      expect(b.engine.status.info.otherDevice.deviceName).toBe("Phone A");
      expect(b.engine.status.info.localRecordCount).toBe(1);
    }
    expect(objects.keys()).toEqual(keysBefore);
    expect(b.queue.size).toBe(1);
    expect(b.history.lastSync).toMatchObject({ status: "cancelled", details: "Conflict with Phone A" });
    expect(b.telemetry.trackConflictDetected).toHaveBeenCalledWith("phone", 1);

    expect(await b.engine.performFullSyncSafely()).toEqual({ outcome: "skipped", reason: "busy" });
  });

  it("touches no record documents when a conflict stops the pass", async () => {
    const { objects, b } = await seedTwoDevices();
    const list = vi.spyOn(objects, "list");
    const download = vi.spyOn(objects, "download");
    const upload = vi.spyOn(objects, "upload");
    const get = vi.spyOn(b.store, "get");
    const all = vi.spyOn(b.store, "all");
    const put = vi.spyOn(b.store, "put");
    const count = vi.spyOn(b.store, "count");

    await b.engine.performFullSyncSafely();

    expect(download.mock.calls).toEqual([[REGISTRY_KEY]]);
    expect(list).not.toHaveBeenCalled();
    expect(upload).not.toHaveBeenCalled();
    expect(get).not.toHaveBeenCalled();
    expect(all).not.toHaveBeenCalled();
    expect(put).not.toHaveBeenCalled();
    expect(count).toHaveBeenCalledTimes(1);
  });

  it("re-detects a dismissed conflict on the next pass", async () => {
    const { b } = await seedTwoDevices();
    expect(b.engine.dismissConflict()).toBe(false);

    await b.engine.performFullSyncSafely();
    expect(b.engine.dismissConflict()).toBe(true);
    expect(b.engine.status).toEqual(IDLE);

    await b.engine.performFullSyncSafely();
    expect(b.engine.status.state).toBe("conflictDetected");
  });

  it("mirrors the cloud when the new device chooses cloud data", async () => {
    const { objects, a, b, stretch, read, local } = await seedTwoDevices();
    await b.engine.performFullSyncSafely();

    const resolved = await b.engine.handleConflictResolution("useCloudData");

    expect(resolved).toEqual({ outcome: "completed", status: { state: "success", message: "Synced 2↓ 0↑" } });
    expect(b.engine.status).toEqual(IDLE);
    expect((await b.store.get("HabitTemplate", stretch.syncID))?.isDeleted).toBe(false);
    expect((await b.store.get("HabitTemplate", read.syncID))?.isDeleted).toBe(false);
    expect((await b.store.get("HabitTemplate", local.syncID))?.isDeleted).toBe(true);
    expect(await b.store.count()).toBe(2);
    expect(b.queue.size).toBe(0);
    expect(b.telemetry.trackConflictResolved).toHaveBeenCalledWith("useCloudData", true);

    const registry = await readRegistry(objects);
    expect(registry?.registeredDevices.map((d) => [d.deviceID, d.isPrimary])).toEqual([
      ["device-a", true],
      ["device-b", false],
    ]);
    expect(registry?.lastModifiedBy).toBe("device-b");

    advance(60_000);
    expect(await b.engine.performFullSyncSafely()).toEqual({
      outcome: "completed",
      status: { state: "success", message: "Up to date" },
    });
    expect(await a.engine.performFullSyncSafely()).toEqual({
      outcome: "completed",
      status: { state: "success", message: "Up to date" },
    });
  });

  it("pushes local data when the new device keeps its own", async () => {
    const { objects, a, b, local } = await seedTwoDevices();
    await b.engine.performFullSyncSafely();

    const resolved = await b.engine.handleConflictResolution("useThisDevice");

    expect(resolved).toEqual({ outcome: "completed", status: { state: "success", message: "Synced 0↓ 1↑" } });
    expect(objects.keys()).toContain(`${USER}/records/HabitTemplate_${local.syncID}.json`);
    expect(b.queue.size).toBe(0);

    advance(60_000);
    expect(await a.engine.performFullSyncSafely()).toEqual({
      outcome: "completed",
      status: { state: "success", message: "Synced 1↓ 0↑" },
    });
    expect((await a.store.get("HabitTemplate", local.syncID))?.isDeleted).toBe(false);
  });

  it("lets a resolution run from a fresh process with no pending conflict", async () => {
    const { objects, b } = await seedTwoDevices();

    const resolved = await b.engine.handleConflictResolution("useCloudData");

    expect(resolved.outcome).toBe("completed");
    expect((await readRegistry(objects))?.registeredDevices.map((d) => d.deviceID)).toEqual(["device-a", "device-b"]);
  });
});
