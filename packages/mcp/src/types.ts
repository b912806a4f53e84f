/**
 * MCP Client types
 */

export type ViewportSize = {
  width: number;
  height: number;
};

export type NavigationOptions = {
  timeout?: number;
  signal?: AbortSignal;
};

export type EvaluateOptions = {
  signal?: AbortSignal;
};

export type ScreenshotOptions = {
  path: string;
  fullPage?: boolean;
  type?: "png" | "jpeg";
};

export type BrowserLaunchOptions = {
  command: string;
  args: string[];
  headless: boolean;
  userDataDir?: string;
  viewport?: ViewportSize;
};

/**
 * A rendered page the pipeline can drive. Implemented by MCPBrowserClient;
 * tests substitute in-process fakes.
 */
export interface BrowserPage {
  navigate(url: string, options?: NavigationOptions): Promise<void>;
  /** Runs a function declaration (as source text) in the page and returns its JSON result. */
  evaluate(fn: string, options?: EvaluateOptions): Promise<unknown>;
  screenshot(options: ScreenshotOptions): Promise<string>;
  getHTML(): Promise<string>;
  getCurrentURL(): Promise<string>;
}

/**
 * A browser whose connection lifecycle is owned by the caller.
 */
export interface ManagedBrowser extends BrowserPage {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
}
