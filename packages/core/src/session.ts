/**
 * Authenticated browsing session, persisted across runs
 *
 * Lifecycle: uninitialized -> loading (saved state found) or bootstrapping
 * (interactive login) -> active -> invalidated (login page seen mid-run),
 * after which the next acquireSession(true) bootstraps again.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import type { BrowserPage, ManagedBrowser } from "@report-describer/mcp";
import { AuthenticationRequiredError, errorMessage } from "./errors";
import type { SessionConfig } from "./types";

export type SessionState = "uninitialized" | "loading" | "bootstrapping" | "active" | "invalidated";

export type AuthenticatedContext = {
  page: BrowserPage;
  /** True when this session came from an interactive login */
  interactive: boolean;
  acquiredAt: Date;
};

export interface SessionProvider {
  readonly state: SessionState;
  acquireSession(forceReauth: boolean): Promise<AuthenticatedContext>;
  invalidate(): Promise<void>;
  close(): Promise<void>;
}

export type BrowserFactory = (options: { headless: boolean; userDataDir: string }) => ManagedBrowser;

export type SessionProviderDeps = {
  createBrowser: BrowserFactory;
  /** Resolves once the user confirms they have logged in */
  confirm: (message: string) => Promise<void>;
};

const AuthStateSchema = z.object({
  version: z.literal(1),
  baseUrl: z.string(),
  profileDir: z.string(),
  createdAt: z.string(),
});

type AuthState = z.infer<typeof AuthStateSchema>;

export class PersistentSessionProvider implements SessionProvider {
  private baseUrl: string;
  private stateFile: string;
  private profileDir: string;
  private deps: SessionProviderDeps;
  private browser: ManagedBrowser | null = null;
  private context: AuthenticatedContext | null = null;
  private current: SessionState = "uninitialized";

  constructor(baseUrl: string, config: SessionConfig, deps: SessionProviderDeps) {
    this.baseUrl = baseUrl;
    this.stateFile = path.resolve(config.stateFile);
    this.profileDir = path.resolve(config.profileDir);
    this.deps = deps;
  }

  get state(): SessionState {
    return this.current;
  }

  async acquireSession(forceReauth: boolean): Promise<AuthenticatedContext> {
    if (forceReauth) {
      await this.disconnect();
      await this.discardPersisted();
    } else if (this.context && this.current === "active") {
      return this.context;
    }

    const saved = forceReauth ? null : await this.readState();
    let interactive = false;

    if (saved) {
      this.current = "loading";
      console.log(`Using saved session from ${this.stateFile} (created ${saved.createdAt})`);
    } else {
      await this.bootstrap();
      interactive = true;
    }

    const browser = this.deps.createBrowser({ headless: true, userDataDir: this.profileDir });
    try {
      await browser.connect();
    } catch (error) {
      this.current = "invalidated";
      await browser.disconnect();
      throw new AuthenticationRequiredError(`Could not start the browser session: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    this.browser = browser;
    this.current = "active";
    this.context = { page: browser, interactive, acquiredAt: new Date() };
    return this.context;
  }

  /**
   * Forget the saved session; called when the application redirects to its login page
   */
  async invalidate(): Promise<void> {
    this.current = "invalidated";
    await this.disconnect();
    await fs.promises.rm(this.stateFile, { force: true });
  }

  async close(): Promise<void> {
    await this.disconnect();
    if (this.current === "active") {
      this.current = "uninitialized";
    }
  }

  private async bootstrap(): Promise<void> {
    this.current = "bootstrapping";
    await this.discardPersisted();

    console.log("\n=== Authentication Required ===");
    console.log("A browser window will open. Please log in to the BI application.");

    const browser = this.deps.createBrowser({ headless: false, userDataDir: this.profileDir });
    try {
      await browser.connect();
      console.log(`Opening: ${this.baseUrl}`);
      await browser.navigate(this.baseUrl);
      await this.deps.confirm("\nPress Enter after you have successfully logged in...");
    } catch (error) {
      this.current = "invalidated";
      throw new AuthenticationRequiredError(`Interactive authentication failed: ${errorMessage(error)}`, {
        cause: error,
      });
    } finally {
      await browser.disconnect();
    }

    await this.writeState({
      version: 1,
      baseUrl: this.baseUrl,
      profileDir: this.profileDir,
      createdAt: new Date().toISOString(),
    });
    console.log(`Authentication state saved to ${this.stateFile}`);
  }

  private async readState(): Promise<AuthState | null> {
    if (!fs.existsSync(this.stateFile)) {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await fs.promises.readFile(this.stateFile, "utf8"));
    } catch (error) {
      console.warn(`Ignoring unreadable session state ${this.stateFile}: ${errorMessage(error)}`);
      return null;
    }

    const parsed = AuthStateSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`Ignoring malformed session state ${this.stateFile}`);
      return null;
    }
    if (parsed.data.baseUrl !== this.baseUrl || parsed.data.profileDir !== this.profileDir) {
      console.warn("Saved session belongs to a different application or profile; signing in again");
      return null;
    }
    if (!fs.existsSync(this.profileDir)) {
      console.warn(`Browser profile ${this.profileDir} is missing; signing in again`);
      return null;
    }

    return parsed.data;
  }

  private async writeState(state: AuthState): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.stateFile), { recursive: true });
    const tempPath = `${this.stateFile}.${process.pid}.tmp`;
    await fs.promises.writeFile(tempPath, JSON.stringify(state, null, 2), "utf8");
    await fs.promises.rename(tempPath, this.stateFile);
  }

  private async discardPersisted(): Promise<void> {
    await fs.promises.rm(this.stateFile, { force: true });
    await fs.promises.rm(this.profileDir, { recursive: true, force: true });
  }

  private async disconnect(): Promise<void> {
    this.context = null;
    if (this.browser) {
      const browser = this.browser;
      this.browser = null;
      await browser.disconnect();
    }
  }
}
