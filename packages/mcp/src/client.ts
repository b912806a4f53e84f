/**
 * MCP Client wrapper for chrome-devtools-mcp
 *
 * This provides high-level browser automation methods that interact with
 * the chrome-devtools-mcp server via the MCP SDK.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type {
  BrowserLaunchOptions,
  EvaluateOptions,
  ManagedBrowser,
  NavigationOptions,
  ScreenshotOptions,
} from "./types";

// Headroom over the page's own timeout so the server reports the failure, not the transport.
const REQUEST_TIMEOUT_SLACK_MS = 5000;
const DEFAULT_NAVIGATION_TIMEOUT_MS = 60000;

export class MCPBrowserClient implements ManagedBrowser {
  private client: Client;
  private transport: StdioClientTransport | null = null;
  private isConnected = false;
  private options: BrowserLaunchOptions;

  constructor(options: BrowserLaunchOptions) {
    this.options = options;
    this.client = new Client(
      {
        name: "report-describer-mcp-client",
        version: "0.1.0",
      },
      {
        capabilities: {},
      }
    );
  }

  /**
   * Connect to the chrome-devtools-mcp server
   */
  async connect(): Promise<void> {
    if (this.isConnected) {
      return;
    }

    this.transport = new StdioClientTransport({
      command: this.options.command,
      args: buildServerArgs(this.options),
    });

    await this.client.connect(this.transport);
    this.isConnected = true;
  }

  /**
   * Disconnect from the MCP server
   */
  async disconnect(): Promise<void> {
    if (this.transport) {
      await this.client.close();
      this.isConnected = false;
      this.transport = null;
    }
  }

  /**
   * Navigate to a URL
   */
  async navigate(url: string, options: NavigationOptions = {}): Promise<void> {
    const timeout = options.timeout ?? DEFAULT_NAVIGATION_TIMEOUT_MS;
    await this.callTool(
      "navigate_page",
      { type: "url", url, timeout },
      { signal: options.signal, timeout: timeout + REQUEST_TIMEOUT_SLACK_MS },
      "Navigation failed"
    );
  }

  /**
   * Take a screenshot and write it to options.path
   */
  async screenshot(options: ScreenshotOptions): Promise<string> {
    await this.callTool(
      "take_screenshot",
      {
        filePath: options.path,
        fullPage: options.fullPage ?? true,
        format: options.type || "png",
      },
      {},
      "Screenshot failed"
    );

    return options.path;
  }

  /**
   * Get the full HTML of the page
   */
  async getHTML(): Promise<string> {
    const result = await this.evaluate("() => document.documentElement.outerHTML");
    if (typeof result !== "string") {
      throw new Error("Page HTML was not returned as text");
    }
    return result;
  }

  /**
   * Evaluate a function declaration in the page context
   */
  async evaluate(fn: string, options: EvaluateOptions = {}): Promise<unknown> {
    const text = await this.callTool(
      "evaluate_script",
      { function: fn },
      { signal: options.signal },
      "Script evaluation failed"
    );
    return parseScriptResult(text);
  }

  /**
   * Get the current URL
   */
  async getCurrentURL(): Promise<string> {
    const result = await this.evaluate("() => window.location.href");
    return typeof result === "string" ? result : String(result);
  }

  private async callTool(
    name: string,
    args: Record<string, unknown>,
    requestOptions: { signal?: AbortSignal; timeout?: number },
    failurePrefix: string
  ): Promise<string> {
    if (!this.isConnected) {
      throw new Error(`${failurePrefix}: browser is not connected`);
    }

    const result = await this.client.callTool({ name, arguments: args }, undefined, requestOptions);
    const text = toolText(result);

    if (result.isError === true) {
      throw new Error(`${failurePrefix}: ${text || "unknown error"}`);
    }

    return text;
  }
}

/**
 * Build the chrome-devtools-mcp command line for a launch configuration
 */
export function buildServerArgs(options: BrowserLaunchOptions): string[] {
  const args = [...options.args];

  if (options.headless) {
    args.push("--headless");
  }

  if (options.userDataDir) {
    args.push("--userDataDir", options.userDataDir);
  }

  if (options.viewport) {
    args.push("--viewport", `${options.viewport.width}x${options.viewport.height}`);
  }

  return args;
}

/**
 * Join the text parts of a tool result
 */
export function toolText(result: { [key: string]: unknown; content?: unknown }): string {
  if (!Array.isArray(result.content)) {
    return "";
  }

  const parts: string[] = [];
  for (const item of result.content) {
    if (
      typeof item === "object" &&
      item !== null &&
      "type" in item &&
      item.type === "text" &&
      "text" in item &&
      typeof item.text === "string"
    ) {
      parts.push(item.text);
    }
  }
  return parts.join("\n");
}

/**
 * evaluate_script answers with prose around a fenced JSON block; pull the value out.
 * The block runs to the last fence, since the value itself may contain fences.
 */
export function parseScriptResult(text: string): unknown {
  const fenced = text.match(/```json\s*([\s\S]*)```\s*$/);
  if (fenced) {
    try {
      return JSON.parse(fenced[1].trim());
    } catch (error) {
      throw new Error(
        `Script result is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  const payload = text.trim();
  try {
    return JSON.parse(payload);
  } catch {
    return payload;
  }
}
