/**
 * Telemetry configuration management
 *
 * Reads/writes the `telemetry` section of ~/.orbitsync/config.json
 * Default: telemetry is ON (enabled: true)
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { getConfigDir } from "./user-id.js";

export const TelemetryConfigSchema = z.object({
  enabled: z.boolean().default(true),
  anonymousId: z.string().optional(),
});

export type TelemetryConfig = z.infer<typeof TelemetryConfigSchema>;

const ConfigFileSchema = z
  .object({
    telemetry: TelemetryConfigSchema.optional(),
  })
  .passthrough();

function getConfigFile(): string {
  return join(getConfigDir(), "config.json");
}

function readConfigFile(): z.infer<typeof ConfigFileSchema> | null {
  const configFile = getConfigFile();
  if (!existsSync(configFile)) {
    return null;
  }

  try {
    const parsed = ConfigFileSchema.safeParse(JSON.parse(readFileSync(configFile, "utf-8")));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * Load telemetry configuration
 *
 * @returns TelemetryConfig with defaults applied
 */
export function loadTelemetryConfig(): TelemetryConfig {
  return readConfigFile()?.telemetry ?? { enabled: true };
}

/**
 * Save telemetry configuration
 *
 * Merges with existing config to preserve other settings
 */
export function saveTelemetryConfig(config: TelemetryConfig): void {
  const dir = getConfigDir();

  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }

  const existingConfig = readConfigFile() ?? {};
  writeFileSync(getConfigFile(), JSON.stringify({ ...existingConfig, telemetry: config }, null, 2), {
    mode: 0o600,
  });
}

/**
 * Check if telemetry is enabled without loading full config
 */
export function isTelemetryEnabled(): boolean {
  return loadTelemetryConfig().enabled;
}
