#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import packageJson from "../package.json";
import {
  loadFieldSchema,
  parseNonNegativeInteger,
  parsePositiveInteger,
  parseProvider,
} from "./cliOptions";
import { type WebExtractConfig, loadConfig } from "./config";
import { ExtractionPipeline } from "./pipeline/ExtractionPipeline";
import { AI_MODELS, DEFAULT_MODELS, PROVIDER_DISPLAY_NAMES, isAiProvider } from "./providers/models";
import { LogLevel, logger, parseLogLevel, setLogLevel } from "./utils/logger";

const formatOutput = (data: unknown) => JSON.stringify(data, null, 2);

interface ExtractionCommandOptions {
  schema: string;
  instructions?: string;
  rendered?: boolean;
  maxRetries?: number;
  provider?: string;
  model?: string;
}

interface BatchCommandOptions extends ExtractionCommandOptions {
  concurrency?: number;
  failFast?: boolean;
}

function configOverrides(options: BatchCommandOptions): Partial<WebExtractConfig> {
  return {
    provider: options.provider && isAiProvider(options.provider) ? options.provider : undefined,
    model: options.model,
    preferRendered: options.rendered,
    maxRetries: options.maxRetries,
    concurrency: options.concurrency,
    continueOnError: options.failFast ? false : undefined,
  };
}

function withExtractionOptions(command: Command): Command {
  return command
    .requiredOption("-s, --schema <json|@file>", "Field schema as JSON, or @path to a JSON file")
    .option("-i, --instructions <text>", "Additional instructions for the AI provider")
    .option("--rendered", "Render pages in a headless browser first")
    .option("-r, --max-retries <number>", "Scrape retries after the first attempt", parseNonNegativeInteger)
    .option("-p, --provider <name>", "AI provider: 'openai' or 'gemini'", parseProvider)
    .option("-m, --model <name>", "Model name (defaults to the provider's default model)");
}

async function main() {
  let pipeline: ExtractionPipeline | undefined;
  let exitCode = 0;

  const shutdown = async () => {
    const current = pipeline;
    pipeline = undefined;
    await current?.close();
  };

  // Handle cleanup on SIGINT
  process.once("SIGINT", () => {
    shutdown().then(
      () => process.exit(130),
      (error: unknown) => {
        console.error("Error during shutdown:", error instanceof Error ? error.message : String(error));
        process.exit(1);
      },
    );
  });

  const createPipeline = async (options: BatchCommandOptions) => {
    pipeline = await ExtractionPipeline.fromConfig(loadConfig(process.env, configOverrides(options)));
    return pipeline;
  };

  try {
    const program = new Command();

    program
      .name("webextract")
      .description("Extract structured data from web pages with AI")
      .version(packageJson.version)
      // Add global options for logging level
      .option("--verbose", "Enable verbose (debug) logging", false)
      .option("--silent", "Disable all logging except errors", false);

    withExtractionOptions(
      program.command("extract <url>").description("Extract fields from a single page"),
    ).action(async (url: string, options: ExtractionCommandOptions) => {
      const fieldSchema = await loadFieldSchema(options.schema);
      const result = await (await createPipeline(options)).extract({
        url,
        fieldSchema,
        customInstructions: options.instructions,
      });
      console.log(formatOutput(result));
      if (!result.success) {
        exitCode = 1;
      }
    });

    withExtractionOptions(
      program.command("batch <urls...>").description("Extract the same fields from several pages"),
    )
      .option("-c, --concurrency <number>", "Pages processed at the same time", parsePositiveInteger)
      .option("--fail-fast", "Stop at the first failed page")
      .action(async (urls: string[], options: BatchCommandOptions) => {
        const fieldSchema = await loadFieldSchema(options.schema);
        const results = await (await createPipeline(options)).extractMany(urls, fieldSchema, {
          customInstructions: options.instructions,
          onProgress: ({ completed, total }) => logger.debug(`Progress: ${completed}/${total}`),
        });
        console.log(formatOutput(results));
        if (results.some((result) => !result.success)) {
          exitCode = 1;
        }
      });

    program
      .command("models")
      .description("List known models and their providers")
      .action(() => {
        const models = Object.entries(AI_MODELS).map(([model, provider]) => ({
          model,
          provider,
          providerName: PROVIDER_DISPLAY_NAMES[provider],
          default: DEFAULT_MODELS[provider] === model,
        }));
        console.log(formatOutput(models));
      });

    // Hook to set log level after parsing global options but before executing command action
    program.hook("preAction", (thisCommand) => {
      const options = thisCommand.opts();
      if (options.silent) {
        // If silent is true, it overrides verbose
        setLogLevel(LogLevel.ERROR);
      } else if (options.verbose) {
        setLogLevel(LogLevel.DEBUG);
      } else {
        const level = parseLogLevel(process.env.LOG_LEVEL);
        if (level !== undefined) {
          setLogLevel(level);
        }
      }
    });

    await program.parseAsync();
  } catch (error) {
    console.error("Error:", error instanceof Error ? error.message : String(error));
    await shutdown();
    process.exit(1);
  }

  // Clean shutdown after successful execution
  await shutdown();
  process.exit(exitCode);
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
