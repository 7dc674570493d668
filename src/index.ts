#!/usr/bin/env tsx
import { Command } from "commander";
import { reposCommand } from "./commands/repos";
import { summarizeCommand } from "./commands/summarize";
import { serveCommand } from "./commands/serve";
import { DEFAULT_PROFILE } from "./commands/shared";

const program = new Command();

program
  .name("release-digest")
  .description("Summarize recent GitHub releases of your repositories with an LLM")
  .version("1.0.0")
  .option("--profile <id>", "Repository list to use", DEFAULT_PROFILE);

program.addCommand(reposCommand);     // repos - 저장소 목록 관리
program.addCommand(summarizeCommand); // summarize - 릴리스 요약
program.addCommand(serveCommand);     // serve - 웹 프론트엔드

// Show help if no command provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  await program.parseAsync(process.argv);
}
