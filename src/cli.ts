#!/usr/bin/env node
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { Command } from "commander";
import * as p from "@clack/prompts";
import pc from "picocolors";
import updateNotifier from "update-notifier";
import { loadConfig, requireApiKey, type CliOptions } from "./config.js";
import { GeminiClient } from "./engines/gemini.js";
import { generateCommitMessage } from "./generator.js";
import { commitWithMessage, isInsideWorkTree } from "./git.js";
import { ConfigError } from "./errors.js";
import { withSpinner } from "./ui.js";

interface PackageInfo {
  name: string;
  version: string;
}

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const pkgPath = join(__dirname, "..", "package.json");
const pkg: PackageInfo = JSON.parse(readFileSync(pkgPath, "utf-8"));

updateNotifier({ pkg }).notify();

async function runGenerate(description: string, options: CliOptions): Promise<void> {
  p.intro(pc.bgCyan(pc.black(" gemcommit ")));

  try {
    const config = await loadConfig(options);
    const client = new GeminiClient(requireApiKey(config));

    const message = await withSpinner(
      {
        start: "Generating commit message",
        done: `Generated (${config.style})`,
        failed: "Generation failed",
      },
      () => generateCommitMessage(client, { description, style: config.style })
    );

    p.note(pc.cyan(message), "Commit message");

    if (config.commit) {
      if (!(await isInsideWorkTree())) {
        throw new ConfigError("--commit needs to run inside a git work tree");
      }
      await withSpinner(
        { start: "Committing", done: "Committed successfully", failed: "Commit failed" },
        () => commitWithMessage(message)
      );
    }

    p.outro(pc.green("✓ Done!"));
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    p.log.error(pc.red(`Error: ${msg}`));
    p.outro(pc.red("Failed"));
    process.exit(1);
  }
}

const program = new Command();

program
  .name("gemcommit")
  .description("Generate Git commit messages with the Gemini API")
  .version(pkg.version)
  .argument("<description>", "Short description of the change")
  .option(
    "-s, --style <label>",
    'Message style: conv|plain|gitmoji or any label (default: "conventional commit")'
  )
  .option("--commit", "Run git commit with the generated message")
  .addHelpText(
    "after",
    `
    Examples:
      $ gemcommit "add login rate limit"                # Conventional commit message
      $ gemcommit "fix typo in README" --style gitmoji  # Gitmoji style
      $ gemcommit "bump deps" --commit                  # Generate and commit staged changes
      $ gemcommit init                                  # Write a .gemcommitrc interactively
  `
  )
  .action(async (description: string, options: CliOptions) => {
    await runGenerate(description, options);
  });

program
  .command("init")
  .description("Create a .gemcommitrc in the current directory")
  .action(async () => {
    const { runInit } = await import("./init.js");
    await runInit();
  });

await program.parseAsync();
