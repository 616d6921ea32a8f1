import { parseArgs } from "node:util";
import { z } from "zod";
import { AppConfig, loadConfig, PROVIDERS } from "./config.js";
import { describeError } from "./errors.js";
import { ConsolePrompter, Prompter } from "./io/prompter.js";
import { createLogger, Logger } from "./logger.js";
import { createTextGenerator, listProviderModels, TextGenerator } from "./services/aiService.js";
import { EssayWorkflow } from "./workflow.js";

export const USAGE = [
  "Usage: essay-editor [file] [options]",
  "",
  "Options:",
  "  -p, --provider <name>  gemini | anthropic | openrouter (default: ESSAY_PROVIDER or gemini)",
  "  -m, --model <id>       model id (default: provider default)",
  "  -o, --out-dir <dir>    directory for <name>_edited.txt (default: ESSAY_OUT_DIR or cwd)",
  "      --docx             also write <name>_edited.docx for .docx essays",
  "      --list-models      list the provider's models and exit",
  "  -h, --help             show this help"
].join("\n");

const cliSchema = z.object({
  file: z.string().min(1).optional(),
  provider: z.enum(PROVIDERS).optional(),
  model: z.string().min(1).optional(),
  outDir: z.string().min(1).optional(),
  docx: z.boolean().default(false),
  listModels: z.boolean().default(false),
  help: z.boolean().default(false)
});

export type CliOptions = z.infer<typeof cliSchema>;

export class UsageError extends Error {}

export function parseCliArgs(argv: string[]): CliOptions {
  let parsed: ReturnType<typeof parseCliTokens>;
  try {
    parsed = parseCliTokens(argv);
  } catch (error) {
    throw new UsageError(describeError(error, "Invalid arguments."));
  }

  if (parsed.positionals.length > 1) {
    throw new UsageError("Only one essay file can be edited at a time.");
  }

  const result = cliSchema.safeParse({
    file: parsed.positionals[0],
    provider: parsed.values.provider,
    model: parsed.values.model,
    outDir: parsed.values["out-dir"],
    docx: parsed.values.docx,
    listModels: parsed.values["list-models"],
    help: parsed.values.help
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new UsageError(`Invalid option ${issue?.path.join(".") || ""}: ${issue?.message || "invalid value"}`);
  }
  return result.data;
}

function parseCliTokens(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      provider: { type: "string", short: "p" },
      model: { type: "string", short: "m" },
      "out-dir": { type: "string", short: "o" },
      docx: { type: "boolean" },
      "list-models": { type: "boolean" },
      help: { type: "boolean", short: "h" }
    }
  });
}

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  prompter?: Prompter;
  logger?: Logger;
  createGenerator?: (config: AppConfig) => TextGenerator;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
};

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  // eslint-disable-next-line no-console
  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  // eslint-disable-next-line no-console
  const stderr = deps.stderr ?? ((line: string) => console.error(line));

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    stderr(describeError(error, "Invalid arguments."));
    stderr(USAGE);
    return 2;
  }

  if (options.help) {
    stdout(USAGE);
    return 0;
  }

  let config: AppConfig;
  let generator: TextGenerator;
  try {
    config = loadConfig(deps.env ?? process.env, {
      provider: options.provider,
      model: options.model,
      outDir: options.outDir
    }, deps.cwd ?? process.cwd());
    if (options.listModels) {
      const listed = await listProviderModels(config);
      stdout(`${listed.provider} models (default: ${listed.defaultModel}):`);
      for (const model of listed.models) {
        stdout(model.label ? `  ${model.id}  ${model.label}` : `  ${model.id}`);
      }
      return 0;
    }
    generator = (deps.createGenerator ?? createTextGenerator)(config);
  } catch (error) {
    stderr(`Error: ${describeError(error, "Failed to start.")}`);
    return 1;
  }

  const logger = deps.logger ?? createLogger(config.logLevel);
  logger.debug(`provider=${generator.provider} model=${generator.model} outDir=${config.outDir}`);

  const prompter = deps.prompter ?? new ConsolePrompter();
  try {
    const result = await new EssayWorkflow({
      generator,
      prompter,
      logger,
      outDir: config.outDir,
      filePath: options.file,
      exportDocx: options.docx
    }).run();
    return result.exitCode;
  } finally {
    prompter.close();
  }
}
