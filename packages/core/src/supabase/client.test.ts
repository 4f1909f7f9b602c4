import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  AUTH_SESSION_FILENAME,
  FileAuthStorage,
  createStaticSession,
  createSupabaseSession,
  type AuthClientLike,
} from "./client.js";

describe("FileAuthStorage", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "orbitsync-auth-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("persists items across instances", () => {
    new FileAuthStorage(dir).setItem("sb-session", "test-token");
    expect(new FileAuthStorage(dir).getItem("sb-session")).toBe("test-token");
  });

  it("removes the file with the last item", () => {
    const storage = new FileAuthStorage(dir);
    storage.setItem("sb-session", "test-token");
    storage.removeItem("sb-session");

    expect(storage.getItem("sb-session")).toBeNull();
    expect(existsSync(join(dir, AUTH_SESSION_FILENAME))).toBe(false);
  });
});

describe("createSupabaseSession", () => {
  function authClient(userId: string | null): AuthClientLike {
    return {
      auth: {
        getSession: async () => ({ data: { session: userId ? { user: { id: userId } } : null } }),
      },
    };
  }

  it("reports the signed-in user", async () => {
    const session = createSupabaseSession(authClient("user-1"));
    expect(await session.isSignedIn()).toBe(true);
    expect(await session.userId()).toBe("user-1");
  });

  it("is signed out without a session", async () => {
    expect(await createSupabaseSession(authClient(null)).isSignedIn()).toBe(false);
  });

  it("treats a failing session lookup as signed out", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const session = createSupabaseSession({
      auth: {
        getSession: async () => {
          throw new Error("storage unavailable");
        },
      },
    });

    expect(await session.isSignedIn()).toBe(false);
    errorSpy.mockRestore();
  });
});

describe("createStaticSession", () => {
  it("answers from the given user", async () => {
    expect(await createStaticSession(null).isSignedIn()).toBe(false);
    expect(await createStaticSession("user-2").userId()).toBe("user-2");
  });
});
