import * as yaml from "js-yaml";
import * as fs from "fs";
import { z } from "zod";
import type { GeneratorConfig } from "@report-describer/describer";
import { ConfigMissingError } from "./errors";
import type { AppConfig } from "./types";

/**
 * Default configuration values
 */
const DEFAULT_CONFIG: AppConfig = {
  target: {
    baseUrl: "",
    loginUrlPatterns: ["/login", "accounts.google.com", "/auth/"],
  },
  model: {
    provider: "vertex",
    model: "gemini-2.5-flash",
    project: "",
    region: "",
    maxOutputTokens: 8192,
    temperature: 0.2,
    maxHtmlChars: 50000,
  },
  browser: {
    command: "npx",
    args: ["-y", "chrome-devtools-mcp@latest"],
    viewport: { width: 1600, height: 1000 },
    navigationTimeoutMs: 60000,
  },
  session: {
    stateFile: "auth_state.json",
    profileDir: ".auth/chrome-profile",
  },
  load: {
    maxWaitMs: 60000,
    settleMs: 2000,
    pollIntervalMs: 250,
    indicatorSelectors: [
      ".lk-loading",
      ".loading-spinner",
      "[data-testid='loading']",
      ".dashboard-loading",
      ".viz-loading",
      "lk-spinner",
      "[aria-busy='true']",
    ],
    readySelectors: [],
  },
  pages: {
    controls: [
      { container: '[role="tablist"]', entry: '[role="tab"]' },
      { container: ".page-navigation", entry: ".navItem" },
      { container: '[data-testid="dashboard-tabs"]', entry: "button" },
    ],
  },
  run: {
    throttleRPS: 0.5,
    reportTimeoutMs: 300000,
    outDir: "output",
  },
};

const positiveInt = z.number().int().positive();

/**
 * Shape of the optional YAML file; every key may be omitted
 */
const ConfigFileSchema = z.object({
  target: z
    .object({ baseUrl: z.string(), loginUrlPatterns: z.array(z.string()) })
    .partial()
    .optional(),
  model: z
    .object({
      provider: z.enum(["vertex", "openai"]),
      model: z.string(),
      project: z.string(),
      region: z.string(),
      credentialPath: z.string(),
      maxOutputTokens: positiveInt,
      temperature: z.number().min(0).max(2),
      maxHtmlChars: positiveInt,
    })
    .partial()
    .optional(),
  browser: z
    .object({
      command: z.string(),
      args: z.array(z.string()),
      viewport: z.object({ width: positiveInt, height: positiveInt }),
      navigationTimeoutMs: positiveInt,
    })
    .partial()
    .optional(),
  session: z.object({ stateFile: z.string(), profileDir: z.string() }).partial().optional(),
  load: z
    .object({
      maxWaitMs: positiveInt,
      settleMs: z.number().int().min(0),
      pollIntervalMs: positiveInt,
      indicatorSelectors: z.array(z.string()),
      readySelectors: z.array(z.string()),
    })
    .partial()
    .optional(),
  pages: z
    .object({ controls: z.array(z.object({ container: z.string(), entry: z.string() })) })
    .partial()
    .optional(),
  run: z
    .object({ throttleRPS: z.number().min(0), reportTimeoutMs: positiveInt, outDir: z.string() })
    .partial()
    .optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export const ENV_KEYS = {
  project: "VERTEX_PROJECT_ID",
  region: "VERTEX_LOCATION",
  baseUrl: "LOOKER_BASE_URL",
  credentialPath: "VERTEX_CREDENTIALS_PATH",
  apiKey: "OPENAI_API_KEY",
} as const;

type Env = Record<string, string | undefined>;

/**
 * Load configuration: defaults, then the YAML file, then environment variables
 */
export function loadConfig(configPath?: string, env: Env = process.env): AppConfig {
  const defaults = structuredClone(DEFAULT_CONFIG);
  const file: ConfigFile = configPath
    ? ConfigFileSchema.parse(yaml.load(fs.readFileSync(configPath, "utf8")) ?? {})
    : {};

  const config: AppConfig = {
    target: { ...defaults.target, ...file.target },
    model: { ...defaults.model, ...file.model },
    browser: { ...defaults.browser, ...file.browser },
    session: { ...defaults.session, ...file.session },
    load: { ...defaults.load, ...file.load },
    pages: { ...defaults.pages, ...file.pages },
    run: { ...defaults.run, ...file.run },
  };

  return applyEnv(config, env);
}

function applyEnv(config: AppConfig, env: Env): AppConfig {
  const read = (key: string): string | undefined => {
    const value = env[key]?.trim();
    return value ? value : undefined;
  };

  config.model.project = read(ENV_KEYS.project) ?? config.model.project;
  config.model.region = read(ENV_KEYS.region) ?? config.model.region;
  config.model.credentialPath = read(ENV_KEYS.credentialPath) ?? config.model.credentialPath;
  config.model.apiKey = read(ENV_KEYS.apiKey) ?? config.model.apiKey;
  config.target.baseUrl = read(ENV_KEYS.baseUrl) ?? config.target.baseUrl;

  return config;
}

/**
 * Fail fast on missing required settings, naming the variable to set
 */
export function validateConfig(config: AppConfig): void {
  if (!config.target.baseUrl) {
    throw new ConfigMissingError(ENV_KEYS.baseUrl, "base URL of the BI application");
  }
  if (!isValidUrl(config.target.baseUrl)) {
    throw new ConfigMissingError(ENV_KEYS.baseUrl, `"${config.target.baseUrl}" is not a valid URL`);
  }

  if (config.model.provider === "vertex") {
    if (!config.model.project) {
      throw new ConfigMissingError(ENV_KEYS.project, "Google Cloud project used for billing and quota");
    }
    if (!config.model.region) {
      throw new ConfigMissingError(ENV_KEYS.region, "region of the generation endpoint, e.g. us-central1");
    }
  } else if (!config.model.apiKey) {
    throw new ConfigMissingError(ENV_KEYS.apiKey, "API key for the openai provider");
  }
}

function isValidUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

export function generatorConfigFrom(config: AppConfig): GeneratorConfig {
  const { provider, model, project, region, credentialPath, apiKey, maxOutputTokens, temperature, maxHtmlChars } =
    config.model;
  return { provider, model, project, region, credentialPath, apiKey, maxOutputTokens, temperature, maxHtmlChars };
}
