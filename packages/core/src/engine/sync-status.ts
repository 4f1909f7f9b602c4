/**
 * Sync engine status, published to observers on every transition.
 */

import type { RegisteredDevice } from "../device/registry.js";

export interface ConflictInfo {
  /** Most recently synced foreign device */
  otherDevice: RegisteredDevice;
  /** Live (non-deleted) records on this device */
  localRecordCount: number;
}

export type SyncStatus =
  | { state: "idle" }
  | { state: "syncing"; message: string }
  | { state: "success"; message: string }
  | { state: "failed"; message: string }
  | { state: "conflictDetected"; info: ConflictInfo };

export const IDLE: SyncStatus = { state: "idle" };

export function statusMessage(status: SyncStatus): string {
  switch (status.state) {
    case "idle":
      return "Idle";
    case "syncing":
    case "success":
    case "failed":
      return status.message;
    case "conflictDetected":
      return `Conflict with ${status.info.otherDevice.deviceName}`;
  }
}

export function isActive(status: SyncStatus): boolean {
  return status.state === "syncing";
}

export type ConflictResolution = "useThisDevice" | "useCloudData";
