/**
 * Supabase client for the sync CLI
 *
 * Auth sessions persist to a file in the config directory so a signed-in
 * account survives process restarts.
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { z } from "zod";
import { parseSyncJSON } from "../schema/record.js";

export const AUTH_SESSION_FILENAME = "auth-session.json";

/**
 * Storage adapter for supabase-js auth, one JSON object of key → value.
 */
export class FileAuthStorage {
  private readonly file: string;

  constructor(dir: string) {
    this.file = join(dir, AUTH_SESSION_FILENAME);
  }

  private read(): Record<string, string> {
    if (!existsSync(this.file)) return {};
    const parsed = z.record(z.string()).safeParse(parseSyncJSON(readFileSync(this.file, "utf-8")));
    return parsed.success ? parsed.data : {};
  }

  getItem(key: string): string | null {
    return this.read()[key] ?? null;
  }

  setItem(key: string, value: string): void {
    const values = { ...this.read(), [key]: value };
    const dir = dirname(this.file);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    writeFileSync(this.file, JSON.stringify(values, null, 2), { mode: 0o600 });
  }

  removeItem(key: string): void {
    const values = this.read();
    delete values[key];
    if (Object.keys(values).length === 0) {
      rmSync(this.file, { force: true });
      return;
    }
    writeFileSync(this.file, JSON.stringify(values, null, 2), { mode: 0o600 });
  }
}

export interface SyncClientConfig {
  supabaseUrl: string;
  supabaseAnonKey: string;
}

export function createSyncClient(config: SyncClientConfig, configDir: string): SupabaseClient {
  return createClient(config.supabaseUrl, config.supabaseAnonKey, {
    auth: {
      storage: new FileAuthStorage(configDir),
      persistSession: true,
      autoRefreshToken: false,
      detectSessionInUrl: false,
    },
  });
}

// --- Account Session ---

/**
 * Whether an account is signed in, and which one.
 */
export interface AccountSession {
  isSignedIn(): Promise<boolean>;
  userId(): Promise<string | null>;
}

export interface AuthClientLike {
  auth: {
    getSession(): PromiseLike<{ data: { session: { user: { id: string } } | null } }>;
  };
}

export function createSupabaseSession(client: AuthClientLike): AccountSession {
  async function userId(): Promise<string | null> {
    try {
      const { data } = await client.auth.getSession();
      return data.session?.user.id ?? null;
    } catch (err) {
      console.error("[Auth] Failed to read session:", err);
      return null;
    }
  }

  return {
    userId,
    isSignedIn: async () => (await userId()) !== null,
  };
}

/**
 * Session for tests and local-only setups.
 */
export function createStaticSession(userId: string | null): AccountSession {
  return {
    isSignedIn: async () => userId !== null,
    userId: async () => userId,
  };
}
