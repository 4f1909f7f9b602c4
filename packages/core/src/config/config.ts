/**
 * Configuration
 *
 * Reads ~/.orbitsync/config.json (validated with zod) with environment
 * overrides. The directory can be moved with ORBITSYNC_HOME or, in tests,
 * setConfigDir().
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod";
import { DeviceTypeSchema } from "../device/identity.js";

// --- Config Directory ---

let configDir = process.env.ORBITSYNC_HOME || join(homedir(), ".orbitsync");

/**
 * Override config directory (for testing)
 */
export function setConfigDir(dir: string): void {
  configDir = dir;
}

export function getConfigDir(): string {
  return configDir;
}

export function ensureConfigDir(dir: string = configDir): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
}

// --- Schema ---

export const OrbitConfigSchema = z.object({
  supabaseUrl: z.string().url().optional(),
  supabaseAnonKey: z.string().optional(),
  bucket: z.string().min(1).default("orbitsync"),
  deviceName: z.string().optional(),
  deviceType: DeviceTypeSchema.default("unknown"),
  simulator: z.boolean().default(false),
  cooldownSeconds: z.number().nonnegative().default(30),
  backgroundSyncHour: z.number().int().min(0).max(23).default(3),
  telemetry: z
    .object({
      enabled: z.boolean().default(true),
    })
    .default({}),
});

export type OrbitConfig = z.infer<typeof OrbitConfigSchema>;

function configFile(dir: string): string {
  return join(dir, "config.json");
}

// --- Load / Save ---

/**
 * Load config from disk and apply environment overrides.
 * A missing or malformed file yields defaults.
 */
export function loadConfig(
  dir: string = configDir,
  env: NodeJS.ProcessEnv = process.env
): OrbitConfig {
  let raw: unknown = {};
  const file = configFile(dir);

  if (existsSync(file)) {
    try {
      raw = JSON.parse(readFileSync(file, "utf-8"));
    } catch {
      console.error(`[Config] Ignoring malformed ${file}`);
    }
  }

  const parsed = OrbitConfigSchema.safeParse(raw);
  const config = parsed.success ? parsed.data : OrbitConfigSchema.parse({});
  if (!parsed.success) {
    console.error(`[Config] Invalid config, using defaults: ${parsed.error.issues[0]?.message}`);
  }

  return applyEnvOverrides(config, env);
}

export function applyEnvOverrides(config: OrbitConfig, env: NodeJS.ProcessEnv): OrbitConfig {
  const simulator = env.ORBITSYNC_SIMULATOR;
  return {
    ...config,
    supabaseUrl: env.SUPABASE_URL || config.supabaseUrl,
    supabaseAnonKey: env.SUPABASE_ANON_KEY || config.supabaseAnonKey,
    bucket: env.ORBITSYNC_BUCKET || config.bucket,
    deviceName: env.ORBITSYNC_DEVICE_NAME || config.deviceName,
    simulator: simulator === undefined ? config.simulator : simulator === "1" || simulator === "true",
  };
}

/**
 * Save config, preserving keys this version does not know about.
 */
export function saveConfig(config: Partial<OrbitConfig>, dir: string = configDir): void {
  ensureConfigDir(dir);
  const file = configFile(dir);

  let existing: Record<string, unknown> = {};
  if (existsSync(file)) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(file, "utf-8"));
      if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
        existing = { ...parsed };
      }
    } catch {
      console.error(`[Config] Overwriting malformed ${file}`);
    }
  }

  writeFileSync(file, JSON.stringify({ ...existing, ...config }, null, 2), { mode: 0o600 });
}

/**
 * Get Supabase URL and key, or throw with a hint.
 */
export function requireSupabaseConfig(config: OrbitConfig): { supabaseUrl: string; supabaseAnonKey: string } {
  if (!config.supabaseUrl || !config.supabaseAnonKey) {
    throw new Error("Missing SUPABASE_URL / SUPABASE_ANON_KEY. Set them in the environment or config.json");
  }
  return { supabaseUrl: config.supabaseUrl, supabaseAnonKey: config.supabaseAnonKey };
}
