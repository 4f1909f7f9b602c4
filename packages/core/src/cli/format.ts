/**
 * Plain-text renderings for CLI output.
 */

import type { DeviceIdentity } from "../device/identity.js";
import type { DeviceRegistry } from "../device/registry.js";
import { statusMessage, type SyncStatus } from "../engine/sync-status.js";
import type { SyncHistoryEntry } from "../history/sync-history.js";
import type { SyncQueueItem } from "../queue/sync-queue.js";

export interface StatusSummary {
  status: SyncStatus;
  lastSync: Date | null;
  pending: number;
  overflowed: boolean;
  identity: DeviceIdentity;
  signedIn: boolean;
}

export function formatStatus(summary: StatusSummary): string {
  const lines = [
    `Status:       ${statusMessage(summary.status)}`,
    `Account:      ${summary.signedIn ? "signed in" : "signed out"}`,
    `Last sync:    ${summary.lastSync ? summary.lastSync.toISOString() : "never"}`,
    `Pending:      ${summary.pending}${summary.overflowed ? " (overflowed, next sync uploads everything)" : ""}`,
    `Device:       ${summary.identity.shortDescription}`,
    `Device ID:    ${summary.identity.deviceID}`,
  ];
  return lines.join("\n");
}

export function formatDevices(registry: DeviceRegistry, currentDeviceID: string): string {
  if (registry.registeredDevices.length === 0) {
    return "No devices registered.";
  }

  return registry.registeredDevices
    .map((device) => {
      const tags = [
        device.deviceID === currentDeviceID ? "this device" : null,
        device.isPrimary ? "primary" : null,
        device.isSimulator ? "simulator" : null,
      ].filter((tag): tag is string => tag !== null);
      const suffix = tags.length > 0 ? ` [${tags.join(", ")}]` : "";
      return `${device.deviceName} (${device.deviceType})${suffix}\n  ID: ${device.deviceID}\n  Last sync: ${device.lastSyncDate}`;
    })
    .join("\n");
}

export function formatQueue(items: SyncQueueItem[]): string {
  if (items.length === 0) {
    return "Queue is empty.";
  }
  return items.map((item) => `${item.queuedAt}  ${item.entityType}_${item.syncID}`).join("\n");
}

export function formatHistory(entries: SyncHistoryEntry[]): string {
  if (entries.length === 0) {
    return "No sync history.";
  }

  return entries
    .map((entry) => {
      const counts = `${entry.recordsDownloaded}↓ ${entry.recordsUploaded}↑`;
      const error = entry.errorMessage ? ` - ${entry.errorMessage}` : "";
      return `[${entry.timestamp}] ${entry.action} ${entry.status}: ${entry.details} (${counts}, ${entry.durationMs}ms)${error}`;
    })
    .join("\n");
}
