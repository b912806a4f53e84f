export { MCPBrowserClient, buildServerArgs, parseScriptResult, toolText } from "./client";
export type {
  BrowserLaunchOptions,
  BrowserPage,
  EvaluateOptions,
  ManagedBrowser,
  NavigationOptions,
  ScreenshotOptions,
  ViewportSize,
} from "./types";
