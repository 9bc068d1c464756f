import { writeFileSync, existsSync } from "fs";
import { join } from "path";
import * as p from "@clack/prompts";
import pc from "picocolors";
import { RC_FILE } from "./config.js";
import { DEFAULT_STYLE } from "./engines/shared.js";

export async function runInit(cwd: string = process.cwd()): Promise<void> {
  console.clear();
  p.intro(pc.bgCyan(pc.black(" gemcommit init ")));

  const configPath = join(cwd, RC_FILE);

  if (existsSync(configPath)) {
    const shouldOverwrite = await p.confirm({
      message: `${RC_FILE} already exists. Overwrite?`,
      initialValue: false,
    });

    if (p.isCancel(shouldOverwrite) || !shouldOverwrite) {
      p.outro(pc.yellow("Operation cancelled"));
      return;
    }
  }

  const answers = await p.group(
    {
      style: () =>
        p.select({
          message: "Select commit message style:",
          options: [
            {
              value: DEFAULT_STYLE,
              label: "Conventional",
              hint: "feat(scope): subject (Recommended)",
            },
            { value: "gitmoji", label: "Gitmoji", hint: "✨ add subject" },
            {
              value: "plain imperative",
              label: "Plain",
              hint: "Simple imperative sentence",
            },
          ],
          initialValue: DEFAULT_STYLE,
        }),
      commit: () =>
        p.confirm({
          message: "Commit automatically with the generated message?",
          initialValue: false,
        }),
    },
    {
      onCancel: () => {
        p.outro(pc.yellow("Operation cancelled"));
        process.exit(0);
      },
    }
  );

  const config = { style: answers.style, commit: answers.commit };
  const content = JSON.stringify(config, null, 2);

  writeFileSync(configPath, content + "\n");

  p.note(content, `Generated ${RC_FILE}`);
  p.outro(pc.green("Configuration initialized successfully!"));
}
