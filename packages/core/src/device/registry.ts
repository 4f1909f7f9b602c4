/**
 * Device Registry
 *
 * Shared ledger of every device that has synced this account. Fetched and
 * rewritten wholesale on each pass; all helpers are pure and return new values.
 */

import { z } from "zod";
import { formatSyncDate } from "../schema/record.js";
import type { DeviceIdentityDict } from "./identity.js";

// --- Schema ---

export const RegisteredDeviceSchema = z.object({
  deviceID: z.string().min(1),
  deviceName: z.string(),
  deviceType: z.string(),
  isSimulator: z.boolean(),
  firstSyncDate: z.string(), // ISO timestamp
  lastSyncDate: z.string(), // ISO timestamp
  isPrimary: z.boolean(),
});

export type RegisteredDevice = z.infer<typeof RegisteredDeviceSchema>;

export const DeviceRegistrySchema = z.object({
  registeredDevices: z.array(RegisteredDeviceSchema),
  lastModifiedBy: z.string(),
  lastModifiedAt: z.string(),
});

export type DeviceRegistry = z.infer<typeof DeviceRegistrySchema>;

export function createEmptyRegistry(now: Date = new Date()): DeviceRegistry {
  return {
    registeredDevices: [],
    lastModifiedBy: "",
    lastModifiedAt: formatSyncDate(now),
  };
}

// --- Queries ---

export function isDeviceRegistered(registry: DeviceRegistry, deviceID: string): boolean {
  return registry.registeredDevices.some((device) => device.deviceID === deviceID);
}

/**
 * Most recently synced device other than `excluding`, ignoring simulators.
 */
export function lastOtherDevice(registry: DeviceRegistry, excluding: string): RegisteredDevice | null {
  const candidates = registry.registeredDevices
    .filter((device) => device.deviceID !== excluding && !device.isSimulator)
    .sort((a, b) => Date.parse(b.lastSyncDate) - Date.parse(a.lastSyncDate));

  return candidates[0] ?? null;
}

// --- Mutation ---

/**
 * Idempotent upsert. A known device gets a new lastSyncDate; an unknown one is
 * appended, primary only if the registry was empty.
 */
export function registerDevice(
  registry: DeviceRegistry,
  identity: DeviceIdentityDict,
  now: Date = new Date()
): DeviceRegistry {
  const timestamp = formatSyncDate(now);
  const existing = registry.registeredDevices.findIndex((device) => device.deviceID === identity.deviceID);

  let registeredDevices: RegisteredDevice[];
  if (existing !== -1) {
    registeredDevices = registry.registeredDevices.map((device, index) =>
      index === existing ? { ...device, lastSyncDate: timestamp } : device
    );
  } else {
    registeredDevices = [
      ...registry.registeredDevices,
      {
        deviceID: identity.deviceID,
        deviceName: identity.deviceName,
        deviceType: identity.deviceType,
        isSimulator: identity.isSimulator,
        firstSyncDate: timestamp,
        lastSyncDate: timestamp,
        isPrimary: registry.registeredDevices.length === 0,
      },
    ];
  }

  return {
    registeredDevices,
    lastModifiedBy: identity.deviceID,
    lastModifiedAt: timestamp,
  };
}

// --- Conflict Detection ---

export type ConflictCheck =
  | { conflict: false; reason: "registered" | "first_device" }
  | { conflict: true; otherDevice: RegisteredDevice };

/**
 * - current device present: no conflict
 * - absent, another non-simulator device present: conflict (surface it)
 * - absent, no other real device: no conflict
 */
export function checkForConflict(registry: DeviceRegistry, currentDeviceID: string): ConflictCheck {
  if (isDeviceRegistered(registry, currentDeviceID)) {
    return { conflict: false, reason: "registered" };
  }

  const otherDevice = lastOtherDevice(registry, currentDeviceID);
  if (otherDevice) {
    return { conflict: true, otherDevice };
  }

  return { conflict: false, reason: "first_device" };
}
