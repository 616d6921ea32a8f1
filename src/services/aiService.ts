import Anthropic from "@anthropic-ai/sdk";
import { GoogleGenerativeAI } from "@google/generative-ai";
import { z } from "zod";
import { AppConfig, requireApiKey } from "../config.js";
import { describeError, ModelRequestError, ModelResponseError } from "../errors.js";
import { buildFullRewritePrompt } from "../prompts.js";
import { ListedModel, Provider, Suggestion } from "../types.js";

export interface TextGenerator {
  readonly provider: Provider;
  readonly model: string;
  generate(prompt: string): Promise<string>;
}

type RunnerArgs = {
  prompt: string;
  model: string;
  apiKey: string;
  temperature: number;
};

const openRouterResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional()
      })
    )
    .optional()
});

export function normalizeModelText(raw: string): string {
  const trimmed = raw.trim();
  const fenceMatch = trimmed.match(/^```[\w-]*\s*\n([\s\S]*?)\n?```$/);
  return (fenceMatch?.[1] ?? trimmed).trim();
}

async function runAnthropic(args: RunnerArgs): Promise<string> {
  const client = new Anthropic({ apiKey: args.apiKey });
  const response = await client.messages.create({
    model: args.model,
    max_tokens: 4096,
    temperature: args.temperature,
    messages: [
      {
        role: "user",
        content: args.prompt
      }
    ]
  });

  return response.content
    .flatMap((item) => (item.type === "text" ? [item.text] : []))
    .join("\n");
}

async function runGemini(args: RunnerArgs): Promise<string> {
  const client = new GoogleGenerativeAI(args.apiKey);
  const modelApi = client.getGenerativeModel({
    model: args.model,
    generationConfig: { temperature: args.temperature }
  });
  const response = await modelApi.generateContent(args.prompt);
  return response.response.text();
}

async function runOpenRouter(args: RunnerArgs): Promise<string> {
  const response = await fetch("https://openrouter.ai/api/v1/chat/completions", {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${args.apiKey}`
    },
    body: JSON.stringify({
      model: args.model,
      temperature: args.temperature,
      messages: [
        {
          role: "user",
          content: args.prompt
        }
      ]
    })
  });

  if (!response.ok) {
    const body = await response.text();
    throw new Error(`${response.status} ${body}`);
  }

  const body = openRouterResponseSchema.parse(await response.json());
  return body.choices?.[0]?.message?.content ?? "";
}

const RUNNERS: Record<Provider, (args: RunnerArgs) => Promise<string>> = {
  anthropic: runAnthropic,
  gemini: runGemini,
  openrouter: runOpenRouter
};

export function createTextGenerator(
  config: Pick<AppConfig, "provider" | "model" | "apiKey" | "temperature">
): TextGenerator {
  const apiKey = requireApiKey(config);
  const runner = RUNNERS[config.provider];

  return {
    provider: config.provider,
    model: config.model,
    async generate(prompt: string): Promise<string> {
      let raw: string;
      try {
        raw = await runner({
          prompt,
          model: config.model,
          apiKey,
          temperature: config.temperature
        });
      } catch (error) {
        throw new ModelRequestError(config.provider, describeError(error, "unknown error"), error);
      }

      const text = normalizeModelText(raw);
      if (!text) {
        throw new ModelResponseError(`${config.provider} returned an empty response.`);
      }
      return text;
    }
  };
}

export async function requestSuggestion(
  generator: TextGenerator,
  essayText: string
): Promise<Suggestion> {
  const text = await generator.generate(buildFullRewritePrompt(essayText));
  return {
    text,
    provider: generator.provider,
    model: generator.model,
    createdAt: new Date().toISOString()
  };
}

async function fetchJson(url: string, provider: Provider, headers: Record<string, string> = {}): Promise<unknown> {
  const response = await fetch(url, { headers });
  if (!response.ok) {
    const body = await response.text();
    throw new ModelRequestError(provider, `models request returned ${response.status} ${body}`);
  }
  return response.json();
}

const anthropicModelsSchema = z.object({
  data: z.array(z.object({ id: z.string().optional(), display_name: z.string().optional() })).optional()
});

const geminiModelsSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string().optional(),
        displayName: z.string().optional(),
        supportedGenerationMethods: z.array(z.string()).optional()
      })
    )
    .optional()
});

const openRouterModelsSchema = z.object({
  data: z.array(z.object({ id: z.string().optional(), name: z.string().optional() })).optional()
});

async function listAnthropicModels(apiKey: string): Promise<ListedModel[]> {
  const body = anthropicModelsSchema.parse(
    await fetchJson("https://api.anthropic.com/v1/models", "anthropic", {
      "x-api-key": apiKey,
      "anthropic-version": "2023-06-01"
    })
  );
  return (body.data || []).map((model) => ({ id: model.id || "", label: model.display_name }));
}

async function listGeminiModels(apiKey: string): Promise<ListedModel[]> {
  const body = geminiModelsSchema.parse(
    await fetchJson(
      `https://generativelanguage.googleapis.com/v1beta/models?key=${encodeURIComponent(apiKey)}`,
      "gemini"
    )
  );
  return (body.models || [])
    .filter((model) =>
      (model.supportedGenerationMethods || []).some(
        (method) => method === "generateContent" || method === "streamGenerateContent"
      )
    )
    .map((model) => ({
      id: (model.name || "").replace(/^models\//, ""),
      label: model.displayName
    }));
}

async function listOpenRouterModels(apiKey: string): Promise<ListedModel[]> {
  const body = openRouterModelsSchema.parse(
    await fetchJson("https://openrouter.ai/api/v1/models", "openrouter", {
      Authorization: `Bearer ${apiKey}`
    })
  );
  return (body.data || []).map((model) => ({ id: model.id || "", label: model.name }));
}

export async function listProviderModels(
  config: Pick<AppConfig, "provider" | "model" | "apiKey">
): Promise<{
  provider: Provider;
  models: ListedModel[];
  defaultModel: string;
}> {
  const provider = config.provider;
  const apiKey = requireApiKey(config);

  const rawModels =
    provider === "anthropic"
      ? await listAnthropicModels(apiKey)
      : provider === "gemini"
        ? await listGeminiModels(apiKey)
        : await listOpenRouterModels(apiKey);

  const deduped = new Map<string, ListedModel>();
  for (const model of rawModels) {
    if (model.id.length > 0 && !deduped.has(model.id)) {
      deduped.set(model.id, model);
    }
  }

  const models = Array.from(deduped.values()).sort((left, right) => left.id.localeCompare(right.id));
  return {
    provider,
    models,
    defaultModel: config.model
  };
}
