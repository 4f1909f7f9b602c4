/**
 * CLI Authentication Commands
 *
 * Email/password sign-in against Supabase Auth. The session is persisted in
 * the config directory by the client's storage adapter.
 *
 * Commands:
 *   orbit auth login <email> [password]   Sign in
 *   orbit auth logout                      Sign out
 *   orbit auth status                      Show authentication status
 */

import * as readline from "readline";
import type { SupabaseClient } from "@supabase/supabase-js";
import { getConfigDir, loadConfig, requireSupabaseConfig } from "../config/config.js";
import { errorMessage } from "../errors.js";
import { createSyncClient } from "../supabase/client.js";

/**
 * Prompt user for input (with optional hidden input for passwords)
 */
function prompt(question: string, hidden = false): Promise<string> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    if (hidden && process.stdin.isTTY) {
      process.stdout.write(question);
      let input = "";
      process.stdin.setRawMode(true);
      process.stdin.resume();
      process.stdin.on("data", (char) => {
        const c = char.toString();
        if (c === "\n" || c === "\r") {
          process.stdin.setRawMode(false);
          process.stdout.write("\n");
          rl.close();
          resolve(input);
        } else if (c === "\u0003") {
          // Ctrl+C
          process.exit(1);
        } else if (c === "\u007f") {
          // Backspace
          if (input.length > 0) {
            input = input.slice(0, -1);
            process.stdout.clearLine(0);
            process.stdout.cursorTo(0);
            process.stdout.write(question + "*".repeat(input.length));
          }
        } else {
          input += c;
          process.stdout.write("*");
        }
      });
    } else {
      rl.question(question, (answer) => {
        rl.close();
        resolve(answer);
      });
    }
  });
}

function authClient(): SupabaseClient {
  const dir = getConfigDir();
  return createSyncClient(requireSupabaseConfig(loadConfig(dir)), dir);
}

/**
 * Sign in with email and password
 */
export async function cmdAuthLogin(email?: string, passwordArg?: string): Promise<void> {
  if (!email) {
    console.error("Usage: orbit auth login <email> [password]");
    process.exit(1);
  }

  const client = authClient();
  const { data: existing } = await client.auth.getSession();
  if (existing.session) {
    console.log(`Already signed in as ${existing.session.user.email ?? existing.session.user.id}`);
    const overwrite = await prompt("Sign in as a different account? (y/N): ");
    if (overwrite.toLowerCase() !== "y") {
      console.log("Cancelled.");
      return;
    }
  }

  const password = passwordArg ?? (await prompt("Password: ", true));
  if (!password) {
    console.error("\nError: Password is required.");
    process.exit(1);
  }

  console.log("\nSigning in...");
  const { data, error } = await client.auth.signInWithPassword({ email, password });
  if (error || !data.user) {
    console.error(`\nError: ${error ? error.message : "Sign-in failed"}`);
    process.exit(1);
  }

  console.log(`\nSuccess! Signed in as ${data.user.email ?? data.user.id}`);
  console.log("\nYou can now use:");
  console.log("  orbit sync      - Sync this device");
  console.log("  orbit devices   - List devices on this account");
}

/**
 * Sign out. Local records, queue and history are kept.
 */
export async function cmdAuthLogout(): Promise<void> {
  const client = authClient();
  const { data } = await client.auth.getSession();
  if (!data.session) {
    console.log("Not currently signed in.");
    return;
  }

  const { error } = await client.auth.signOut({ scope: "local" });
  if (error) {
    console.error(`Error signing out: ${error.message}`);
    process.exit(1);
  }
  console.log("Signed out successfully.");
  console.log(`Local records and pending changes are still preserved in ${getConfigDir()}/`);
}

/**
 * Show authentication status
 */
export async function cmdAuthStatus(): Promise<void> {
  const config = loadConfig();
  if (!config.supabaseUrl || !config.supabaseAnonKey) {
    console.log("Status: Not configured");
    console.log("\nSet SUPABASE_URL and SUPABASE_ANON_KEY, then run: orbit auth login <email>");
    return;
  }

  try {
    const { data } = await authClient().auth.getSession();
    if (!data.session) {
      console.log("Status: Not signed in");
      console.log("\nRun: orbit auth login <email>");
      return;
    }

    console.log("Status: Signed in");
    console.log(`User ID: ${data.session.user.id}`);
    if (data.session.user.email) {
      console.log(`Email: ${data.session.user.email}`);
    }
    console.log(`Supabase: ${config.supabaseUrl}`);
  } catch (err) {
    console.error("Error checking status:", errorMessage(err));
  }
}

export function cmdAuthHelp(): void {
  console.log(`
Auth Commands:
  orbit auth login <email> [password]   Sign in (prompts for the password)
  orbit auth logout                      Sign out of this device
  orbit auth status                      Show authentication status
`);
}
