#!/usr/bin/env node
import "dotenv/config";
import { Command, Option } from "commander";
import { z } from "zod";
import { loadConfig, requireOpenAIKey } from "./shared/config.js";
import { ConfigError, errorMessage } from "./shared/errors.js";
import { TransifexClient } from "./shared/transifex-client.js";
import { OpenAIChatModel } from "./shared/translator.js";
import { MODES } from "./shared/types.js";
import {
  runFetchCommand,
  runTranslateCommand,
  runUpdateCommand,
} from "./strings/commands.js";

const POLICIES = ["any", "all"] as const;

const FetchOptionsSchema = z.object({
  mode: z.enum(MODES),
  forceDownload: z.boolean().default(false),
});

const TranslateOptionsSchema = FetchOptionsSchema.extend({
  updateTransifex: z.boolean().default(false),
  failOn: z.enum(POLICIES),
});

const UpdateOptionsSchema = z.object({
  mode: z.enum(MODES),
  failOn: z.enum(POLICIES),
});

const modeOption = () =>
  new Option("--mode <mode>", "which strings to work on")
    .choices(MODES)
    .default("untranslated");

const failOnOption = () =>
  new Option(
    "--fail-on <policy>",
    "exit non-zero when any upload fails, or only when all of them fail",
  )
    .choices(POLICIES)
    .default("any");

/** Runs one command; configuration and top-level API errors exit 1. */
async function run(command: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await command();
  } catch (error) {
    const prefix = error instanceof ConfigError ? "Configuration error" : "Error";
    console.error(`${prefix}: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}

const program = new Command()
  .name("transifex-llm-sync")
  .description(
    "Fetch untranslated or unreviewed Transifex strings, translate or review them with a language model, and push the results back",
  );

program
  .command("fetch-strings")
  .description("download strings to the CSV cache")
  .addOption(modeOption())
  .option("--force-download", "ignore cached CSV files", false)
  .action(async (raw: unknown) => {
    await run(async () => {
      const options = FetchOptionsSchema.parse(raw);
      const config = loadConfig(process.env);
      return runFetchCommand(new TransifexClient(config.transifex), config, options);
    });
  });

program
  .command("translate")
  .description("fetch, translate or review with the language model, and optionally push back")
  .addOption(modeOption())
  .option("--force-download", "ignore cached CSV files", false)
  .option("--update-transifex", "push results back to Transifex", false)
  .addOption(failOnOption())
  .action(async (raw: unknown) => {
    await run(async () => {
      const options = TranslateOptionsSchema.parse(raw);
      const config = loadConfig(process.env);
      const model = new OpenAIChatModel(requireOpenAIKey(config), config.openai.model);
      return runTranslateCommand(
        new TransifexClient(config.transifex),
        model,
        config,
        options,
      );
    });
  });

program
  .command("update")
  .description("push saved translation results to Transifex")
  .addOption(modeOption())
  .addOption(failOnOption())
  .action(async (raw: unknown) => {
    await run(async () => {
      const options = UpdateOptionsSchema.parse(raw);
      const config = loadConfig(process.env);
      return runUpdateCommand(new TransifexClient(config.transifex), config, options);
    });
  });

await program.parseAsync(process.argv);
