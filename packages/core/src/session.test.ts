import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { tmpdir } from "os";
import type { ManagedBrowser } from "@report-describer/mcp";
import { AuthenticationRequiredError } from "./errors";
import { PersistentSessionProvider, type SessionProviderDeps } from "./session";
import type { SessionConfig } from "./types";

const BASE_URL = "https://bi.example.com";

class FakeBrowser implements ManagedBrowser {
  connected = false;
  visited: string[] = [];

  constructor(readonly headless: boolean) {}

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  async navigate(url: string): Promise<void> {
    this.visited.push(url);
  }

  async evaluate(): Promise<unknown> {
    return null;
  }

  async screenshot(): Promise<string> {
    return "";
  }

  async getHTML(): Promise<string> {
    return "<body></body>";
  }

  async getCurrentURL(): Promise<string> {
    return BASE_URL;
  }
}

describe("PersistentSessionProvider", () => {
  let tempDir: string;
  let config: SessionConfig;
  let browsers: FakeBrowser[];
  let confirm: Mock<(message: string) => Promise<void>>;
  let deps: SessionProviderDeps;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    tempDir = fs.mkdtempSync(path.join(tmpdir(), "session-test-"));
    config = {
      stateFile: path.join(tempDir, "auth_state.json"),
      profileDir: path.join(tempDir, "profile"),
    };
    browsers = [];
    confirm = vi.fn<(message: string) => Promise<void>>(async () => undefined);
    deps = {
      createBrowser: ({ headless }) => {
        const browser = new FakeBrowser(headless);
        browsers.push(browser);
        return browser;
      },
      confirm,
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function saveState(baseUrl = BASE_URL): void {
    fs.mkdirSync(config.profileDir, { recursive: true });
    fs.writeFileSync(
      config.stateFile,
      JSON.stringify({ version: 1, baseUrl, profileDir: config.profileDir, createdAt: "2026-01-05T09:00:00.000Z" })
    );
  }

  it("should sign in interactively when no session is saved", async () => {
    const provider = new PersistentSessionProvider(BASE_URL, config, deps);

    const context = await provider.acquireSession(false);

    expect(confirm).toHaveBeenCalledTimes(1);
    expect(browsers.map((b) => b.headless)).toEqual([false, true]);
    expect(browsers[0].visited).toEqual([BASE_URL]);
    expect(browsers[0].connected).toBe(false);
    expect(context.page).toBe(browsers[1]);
    expect(context.interactive).toBe(true);
    expect(provider.state).toBe("active");

    const saved: unknown = JSON.parse(fs.readFileSync(config.stateFile, "utf8"));
    expect(saved).toMatchObject({ version: 1, baseUrl: BASE_URL, profileDir: config.profileDir });
  });

  it("should reuse a saved session without prompting", async () => {
    saveState();
    const provider = new PersistentSessionProvider(BASE_URL, config, deps);

    const context = await provider.acquireSession(false);

    expect(confirm).not.toHaveBeenCalled();
    expect(browsers.map((b) => b.headless)).toEqual([true]);
    expect(context.interactive).toBe(false);
    expect(provider.state).toBe("active");
  });

  it("should return the active session on repeated calls", async () => {
    saveState();
    const provider = new PersistentSessionProvider(BASE_URL, config, deps);

    const first = await provider.acquireSession(false);
    const second = await provider.acquireSession(false);

    expect(second).toBe(first);
    expect(browsers).toHaveLength(1);
  });

  it("should discard the saved session and sign in again when forced", async () => {
    saveState();
    fs.writeFileSync(path.join(config.profileDir, "Cookies"), "old-cookies");
    const provider = new PersistentSessionProvider(BASE_URL, config, deps);

    const context = await provider.acquireSession(true);

    expect(confirm).toHaveBeenCalledTimes(1);
    expect(context.interactive).toBe(true);
    expect(fs.existsSync(path.join(config.profileDir, "Cookies"))).toBe(false);
  });

  it("should ignore a session saved for another application", async () => {
    saveState("https://other.example.com");
    const provider = new PersistentSessionProvider(BASE_URL, config, deps);

    await provider.acquireSession(false);

    expect(confirm).toHaveBeenCalledTimes(1);
  });

  it("should ignore a malformed state file", async () => {
    fs.mkdirSync(config.profileDir, { recursive: true });
    fs.writeFileSync(config.stateFile, "{not json");
    const provider = new PersistentSessionProvider(BASE_URL, config, deps);

    await provider.acquireSession(false);

    expect(confirm).toHaveBeenCalledTimes(1);
  });

  it("should forget the session when invalidated", async () => {
    saveState();
    const provider = new PersistentSessionProvider(BASE_URL, config, deps);
    await provider.acquireSession(false);

    await provider.invalidate();

    expect(provider.state).toBe("invalidated");
    expect(browsers[0].connected).toBe(false);
    expect(fs.existsSync(config.stateFile)).toBe(false);
  });

  it("should raise AuthenticationRequired when the interactive login fails", async () => {
    confirm.mockRejectedValueOnce(new Error("stdin closed"));
    const provider = new PersistentSessionProvider(BASE_URL, config, deps);

    const error = await provider.acquireSession(false).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationRequiredError);
    expect(error).toMatchObject({ message: "Interactive authentication failed: stdin closed" });
    expect(provider.state).toBe("invalidated");
    expect(browsers).toHaveLength(1);
    expect(browsers[0].connected).toBe(false);
    expect(fs.existsSync(config.stateFile)).toBe(false);
  });

  it("should raise AuthenticationRequired when the browser cannot be started", async () => {
    saveState();
    deps.createBrowser = ({ headless }) => {
      const browser = new FakeBrowser(headless);
      browser.connect = async () => {
        throw new Error("spawn npx ENOENT");
      };
      browsers.push(browser);
      return browser;
    };
    const provider = new PersistentSessionProvider(BASE_URL, config, deps);

    const error = await provider.acquireSession(false).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationRequiredError);
    expect(error).toMatchObject({ message: "Could not start the browser session: spawn npx ENOENT" });
    expect(provider.state).toBe("invalidated");
    expect(browsers).toHaveLength(1);
  });

  it("should disconnect the browser on close", async () => {
    saveState();
    const provider = new PersistentSessionProvider(BASE_URL, config, deps);
    await provider.acquireSession(false);

    await provider.close();

    expect(browsers[0].connected).toBe(false);
    expect(provider.state).toBe("uninitialized");
  });
});
