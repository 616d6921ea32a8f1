import { z } from "zod";
import { ConfigError } from "./errors.js";
import { Provider } from "./types.js";

export const PROVIDERS = ["gemini", "anthropic", "openrouter"] as const satisfies readonly Provider[];

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const emptyToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(emptyToUndefined, z.string().trim().optional());

const envSchema = z.object({
  ESSAY_PROVIDER: z.preprocess(emptyToUndefined, z.enum(PROVIDERS).default("gemini")),
  GEMINI_API_KEY: optionalString,
  GOOGLE_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  OPENROUTER_API_KEY: optionalString,
  GEMINI_MODEL: optionalString,
  CLAUDE_MODEL: optionalString,
  OPENROUTER_MODEL: optionalString,
  ESSAY_TEMPERATURE: z.preprocess(emptyToUndefined, z.coerce.number().min(0).max(2).default(0.3)),
  ESSAY_OUT_DIR: optionalString,
  ESSAY_LOG_LEVEL: z.preprocess(emptyToUndefined, z.enum(LOG_LEVELS).default("info"))
});

export type AppConfig = {
  provider: Provider;
  model: string;
  apiKey?: string;
  temperature: number;
  outDir: string;
  logLevel: LogLevel;
};

export type ConfigOverrides = {
  provider?: Provider;
  model?: string;
  outDir?: string;
};

type ParsedEnv = z.infer<typeof envSchema>;

export function resolveDefaultModel(provider: Provider, env: ParsedEnv): string {
  return provider === "anthropic"
    ? env.CLAUDE_MODEL || "claude-3-5-sonnet-latest"
    : provider === "gemini"
      ? env.GEMINI_MODEL || "gemini-2.0-flash"
      : env.OPENROUTER_MODEL || "openai/gpt-4o-mini";
}

function resolveApiKey(provider: Provider, env: ParsedEnv): string | undefined {
  return provider === "anthropic"
    ? env.ANTHROPIC_API_KEY
    : provider === "gemini"
      ? env.GEMINI_API_KEY || env.GOOGLE_API_KEY
      : env.OPENROUTER_API_KEY;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
  cwd: string = process.cwd()
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(
      `Invalid environment variable ${issue?.path.join(".") || "(unknown)"}: ${issue?.message || "invalid value"}`
    );
  }

  const provider = overrides.provider ?? parsed.data.ESSAY_PROVIDER;
  return {
    provider,
    model: overrides.model?.trim() || resolveDefaultModel(provider, parsed.data),
    apiKey: resolveApiKey(provider, parsed.data),
    temperature: parsed.data.ESSAY_TEMPERATURE,
    outDir: overrides.outDir?.trim() || parsed.data.ESSAY_OUT_DIR || cwd,
    logLevel: parsed.data.ESSAY_LOG_LEVEL
  };
}

export function requireApiKey(config: Pick<AppConfig, "provider" | "apiKey">): string {
  const apiKey = config.apiKey?.trim();
  if (apiKey) {
    return apiKey;
  }

  const variable =
    config.provider === "anthropic"
      ? "ANTHROPIC_API_KEY"
      : config.provider === "gemini"
        ? "GEMINI_API_KEY (or GOOGLE_API_KEY)"
        : "OPENROUTER_API_KEY";
  throw new ConfigError(`Missing API key for provider "${config.provider}". Set ${variable}.`);
}
