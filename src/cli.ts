#!/usr/bin/env node
import { Command } from "commander";
import { runDiffCommand } from "./commands/diffCommand.js";

const program = new Command();

program
  .name("export-diff")
  .description("Compare two planning-tool CSV exports and show what changed")
  .argument("<baseline>", "path to the baseline CSV file")
  .argument("<comparison>", "path to the comparison CSV file")
  .option("-t, --tolerance <number>", "largest numeric difference still treated as equal")
  .option("-l, --limit <number>", "rows listed per change set")
  .option("--json", "print the full result as JSON")
  .action((baseline: string, comparison: string, options: unknown) => {
    process.exitCode = runDiffCommand(baseline, comparison, options, {
      out: (text) => console.log(text),
      err: (text) => console.error(text)
    });
  });

program.parse();
