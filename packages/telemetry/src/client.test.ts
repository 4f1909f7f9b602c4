import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Mock } from "vitest";
import { existsSync, mkdirSync, rmSync, writeFileSync, readFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";

interface FakePostHog {
  capture: Mock;
  shutdown: Mock;
}

const posthogInstances = vi.hoisted(() => {
  const instances: FakePostHog[] = [];
  return instances;
});

// Mock posthog-node before imports
vi.mock("posthog-node", () => ({
  PostHog: vi.fn().mockImplementation(() => {
    const instance = {
      capture: vi.fn(),
      shutdown: vi.fn().mockResolvedValue(undefined),
    };
    posthogInstances.push(instance);
    return instance;
  }),
}));

import { PostHog } from "posthog-node";
import {
  TelemetryClient,
  getTelemetryClient,
  shutdownTelemetry,
  resetTelemetryClient,
} from "./client.js";
import { hashForAnonymity, setConfigDir } from "./user-id.js";

const TEST_DIR = join(tmpdir(), `orbitsync-telemetry-test-${Date.now()}`);

function lastPostHog(): FakePostHog | undefined {
  return posthogInstances[posthogInstances.length - 1];
}

describe("TelemetryClient", () => {
  beforeEach(() => {
    resetTelemetryClient();
    posthogInstances.length = 0;
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true });
    }
    mkdirSync(TEST_DIR, { recursive: true });
    setConfigDir(TEST_DIR);
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true });
    }
    vi.clearAllMocks();
  });

  describe("initialization", () => {
    it("is enabled by default", () => {
      const client = new TelemetryClient({ forceUserId: "test-user" });
      expect(client.isEnabled()).toBe(true);
    });

    it("respects enabled: false in config", () => {
      writeFileSync(join(TEST_DIR, "config.json"), JSON.stringify({ telemetry: { enabled: false } }));
      const client = new TelemetryClient({ forceUserId: "test-user" });
      expect(client.isEnabled()).toBe(false);
    });

    it("respects constructor options over config", () => {
      writeFileSync(join(TEST_DIR, "config.json"), JSON.stringify({ telemetry: { enabled: true } }));
      const client = new TelemetryClient({ enabled: false, forceUserId: "test-user" });
      expect(client.isEnabled()).toBe(false);
    });

    it("derives the anonymous ID from the device-id file and saves it", () => {
      writeFileSync(join(TEST_DIR, "device-id"), "device-123\n");

      const client = new TelemetryClient();
      expect(client.getUserId()).toBe(hashForAnonymity("device-123"));
      expect(client.getUserId()).toMatch(/^[a-f0-9]{16}$/);

      const config = JSON.parse(readFileSync(join(TEST_DIR, "config.json"), "utf-8"));
      expect(config.telemetry.anonymousId).toBe(client.getUserId());
    });

    it("keeps other config keys when saving", () => {
      writeFileSync(join(TEST_DIR, "config.json"), JSON.stringify({ bucket: "test-bucket" }));

      new TelemetryClient();

      const config = JSON.parse(readFileSync(join(TEST_DIR, "config.json"), "utf-8"));
      expect(config.bucket).toBe("test-bucket");
    });

    it("reuses saved anonymousId from config", () => {
      const savedId = "abcd1234abcd1234";
      writeFileSync(
        join(TEST_DIR, "config.json"),
        JSON.stringify({ telemetry: { enabled: true, anonymousId: savedId } })
      );

      const client = new TelemetryClient();
      expect(client.getUserId()).toBe(savedId);
    });

    it("does not create a PostHog client without an API key", () => {
      new TelemetryClient({ forceUserId: "test-user" });
      expect(PostHog).not.toHaveBeenCalled();
    });
  });

  describe("opt-out", () => {
    it("persists disabled state to config", async () => {
      const client = new TelemetryClient({ forceUserId: "test-user" });
      await client.disable();

      const config = JSON.parse(readFileSync(join(TEST_DIR, "config.json"), "utf-8"));
      expect(config.telemetry.enabled).toBe(false);
    });

    it("can re-enable after disabling", async () => {
      const client = new TelemetryClient({ forceUserId: "test-user" });
      await client.disable();
      expect(client.isEnabled()).toBe(false);

      client.enable();
      expect(client.isEnabled()).toBe(true);

      const config = JSON.parse(readFileSync(join(TEST_DIR, "config.json"), "utf-8"));
      expect(config.telemetry.enabled).toBe(true);
    });
  });

  describe("tracking", () => {
    it("captures sync completion with counts and connector", () => {
      const client = new TelemetryClient({ forceUserId: "test-user", apiKey: "test-key" });
      client.setConnector("cli");
      client.trackSyncCompleted("manualSync", { uploaded: 3, downloaded: 2, failed: 1 }, 120);

      expect(lastPostHog()?.capture).toHaveBeenCalledWith({
        distinctId: "test-user",
        event: "sync.completed",
        properties: {
          trigger: "manualSync",
          records_uploaded: 3,
          records_downloaded: 2,
          records_failed: 1,
          duration_ms: 120,
          $lib: "@orbitsync/telemetry",
          $lib_version: "0.1.0",
          connector: "cli",
        },
      });
    });

    it("captures failures and conflicts", () => {
      const client = new TelemetryClient({ forceUserId: "test-user", apiKey: "test-key" });
      client.trackSyncFailed("fullSync", "network", 50);
      client.trackConflictDetected("phone", 4);
      client.trackConflictResolved("useCloudData", true);

      const capture = lastPostHog()?.capture;
      expect(capture).toHaveBeenCalledTimes(3);
      expect(capture).toHaveBeenCalledWith(
        expect.objectContaining({
          event: "sync.conflict_resolved",
          properties: expect.objectContaining({ choice: "useCloudData", success: true }),
        })
      );
    });

    it("does not capture when disabled", () => {
      const client = new TelemetryClient({ enabled: false, forceUserId: "test-user", apiKey: "test-key" });
      client.trackSyncFailed("backgroundSync", "unauthorized", 10);
      expect(PostHog).not.toHaveBeenCalled();
    });
  });

  describe("shutdown", () => {
    it("flushes events on shutdown", async () => {
      const client = new TelemetryClient({ forceUserId: "test-user", apiKey: "test-key" });
      const posthog = lastPostHog();
      await client.shutdown();
      expect(posthog?.shutdown).toHaveBeenCalledTimes(1);
    });

    it("can shutdown multiple times safely", async () => {
      const client = new TelemetryClient({ forceUserId: "test-user", apiKey: "test-key" });
      const posthog = lastPostHog();
      await client.shutdown();
      await client.shutdown();
      expect(posthog?.shutdown).toHaveBeenCalledTimes(1);
    });
  });

  describe("singleton", () => {
    it("returns same instance from getTelemetryClient", () => {
      expect(getTelemetryClient()).toBe(getTelemetryClient());
    });

    it("shutdownTelemetry clears singleton", async () => {
      const client1 = getTelemetryClient();
      await shutdownTelemetry();
      expect(getTelemetryClient()).not.toBe(client1);
    });

    it("resetTelemetryClient clears singleton", () => {
      const client1 = getTelemetryClient();
      resetTelemetryClient();
      expect(getTelemetryClient()).not.toBe(client1);
    });
  });
});
