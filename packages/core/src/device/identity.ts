/**
 * Device Identity
 *
 * One stable UUID per installation, kept in a secure store that survives
 * reinstalls. The first generation prefers a hardware-derived vendor
 * identifier and falls back to a random UUID.
 *
 * isSimulator matters: simulator devices never count as a competing device in
 * conflict detection and never write the registry.
 */

import { createHash, randomUUID } from "crypto";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { hostname, networkInterfaces } from "os";
import { join } from "path";
import { z } from "zod";

export const DeviceTypeSchema = z.enum(["phone", "tablet", "simulator", "unknown"]);

export type DeviceType = z.infer<typeof DeviceTypeSchema>;

const DEVICE_ID_KEY = "device-id";

// --- Secure Store ---

/**
 * Reinstall-surviving key-value store for secrets.
 */
export interface SecureStore {
  get(key: string): string | null;
  set(key: string, value: string): void;
}

/**
 * One owner-only file per key inside the config directory.
 */
export class FileSecureStore implements SecureStore {
  constructor(private readonly dir: string) {}

  get(key: string): string | null {
    const file = join(this.dir, key);
    if (!existsSync(file)) return null;
    try {
      const value = readFileSync(file, "utf-8").trim();
      return value.length > 0 ? value : null;
    } catch (err) {
      console.error(`[DeviceIdentity] Failed to read ${key}:`, err);
      return null;
    }
  }

  set(key: string, value: string): void {
    if (!existsSync(this.dir)) {
      mkdirSync(this.dir, { recursive: true, mode: 0o700 });
    }
    writeFileSync(join(this.dir, key), value, { mode: 0o600 });
  }
}

export class MemorySecureStore implements SecureStore {
  private values = new Map<string, string>();

  get(key: string): string | null {
    return this.values.get(key) ?? null;
  }

  set(key: string, value: string): void {
    this.values.set(key, value);
  }
}

// --- Vendor Identifier ---

/**
 * Hardware-derived identifier: a UUID-shaped SHA-256 of the hostname and the
 * first non-internal MAC address. Null when no hardware address is visible.
 */
export function readVendorIdentifier(): string | null {
  const macs: string[] = [];
  for (const addresses of Object.values(networkInterfaces())) {
    for (const address of addresses ?? []) {
      if (!address.internal && address.mac && address.mac !== "00:00:00:00:00:00") {
        macs.push(address.mac);
      }
    }
  }
  if (macs.length === 0) return null;

  macs.sort();
  return uuidFromHash(`orbitsync:${hostname()}:${macs[0]}`);
}

export function uuidFromHash(input: string): string {
  const hex = createHash("sha256").update(input).digest("hex");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    // Version 8 (custom) and RFC 4122 variant
    `8${hex.slice(13, 16)}`,
    `${((parseInt(hex.slice(16, 17), 16) & 0x3) | 0x8).toString(16)}${hex.slice(17, 20)}`,
    hex.slice(20, 32),
  ].join("-");
}

/**
 * Existing ID from the secure store, or a new one (vendor identifier first,
 * then random) that is stored before being returned.
 */
export function getOrCreateDeviceID(
  store: SecureStore,
  vendorIdentifier: () => string | null = readVendorIdentifier
): string {
  const existing = store.get(DEVICE_ID_KEY);
  if (existing) return existing;

  const newID = vendorIdentifier() ?? randomUUID();
  try {
    store.set(DEVICE_ID_KEY, newID);
  } catch (err) {
    console.error("[DeviceIdentity] Failed to persist device ID:", err);
  }
  return newID;
}

// --- Identity ---

export interface DeviceIdentityOptions {
  store: SecureStore;
  deviceName?: string;
  deviceType?: DeviceType;
  isSimulator?: boolean;
  vendorIdentifier?: () => string | null;
}

export interface DeviceIdentityDict {
  deviceID: string;
  deviceName: string;
  deviceType: DeviceType;
  isSimulator: boolean;
}

export class DeviceIdentity {
  readonly deviceID: string;
  readonly deviceName: string;
  readonly deviceType: DeviceType;
  readonly isSimulator: boolean;

  constructor(fields: DeviceIdentityDict) {
    this.deviceID = fields.deviceID;
    this.deviceName = fields.deviceName;
    this.isSimulator = fields.isSimulator;
    this.deviceType = fields.isSimulator ? "simulator" : fields.deviceType;
  }

  static resolve(options: DeviceIdentityOptions): DeviceIdentity {
    return new DeviceIdentity({
      deviceID: getOrCreateDeviceID(options.store, options.vendorIdentifier),
      deviceName: options.deviceName ?? hostname(),
      deviceType: options.deviceType ?? "unknown",
      isSimulator: options.isSimulator ?? false,
    });
  }

  /** Registry payload projection */
  toDict(): DeviceIdentityDict {
    return {
      deviceID: this.deviceID,
      deviceName: this.deviceName,
      deviceType: this.deviceType,
      isSimulator: this.isSimulator,
    };
  }

  get shortDescription(): string {
    if (this.isSimulator) return "Simulator";
    return `${this.deviceName} (${this.deviceType})`;
  }
}
