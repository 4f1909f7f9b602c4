/**
 * Anonymous user ID generation for telemetry
 *
 * Uses SHA-256 hash of the device ID so the value cannot be traced back to
 * the device and stays stable across sessions.
 */

import { createHash } from "crypto";
import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";

let configDir = process.env.ORBITSYNC_HOME || join(homedir(), ".orbitsync");

/**
 * Override config directory (for testing)
 */
export function setConfigDir(dir: string): void {
  configDir = dir;
}

/**
 * Get current config directory
 */
export function getConfigDir(): string {
  return configDir;
}

/**
 * Generate a stable anonymous user ID from the stored device ID.
 *
 * @returns 16-character hex string (SHA-256 truncated)
 */
export function getAnonymousUserId(): string {
  const deviceIdFile = join(configDir, "device-id");

  let deviceId = "unknown-device";

  if (existsSync(deviceIdFile)) {
    try {
      deviceId = readFileSync(deviceIdFile, "utf-8").trim() || deviceId;
    } catch {
      // Fall through to use default
    }
  }

  return hashForAnonymity(deviceId);
}

/**
 * Deterministic anonymous hash for any identifier
 */
export function hashForAnonymity(input: string): string {
  const hash = createHash("sha256");
  hash.update(`orbitsync:${input}`);
  return hash.digest("hex").slice(0, 16); // 16 chars is enough for uniqueness
}
