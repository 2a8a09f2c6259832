#!/usr/bin/env node
import "reflect-metadata";
import { Command } from "commander";
import { container } from "tsyringe";
import { columnsCommand } from "./commands/columns";
import { groupCommand } from "./commands/group";
import { searchCommand } from "./commands/search";
import { loadConfig } from "./config/app.config";
import { setupDI } from "./config/di.setup";
import { ICsvAnalyzer } from "./services/csv-analyzer.interface";

async function main() {
  try {
    const config = loadConfig();
    setupDI(config);

    // Fresh analyzer per command run
    const resolveAnalyzer = () => container.resolve<ICsvAnalyzer>("ICsvAnalyzer");

    const program = new Command();

    program
      .name("csv-grouper")
      .description("Group the rows of several CSV files by a shared column and export them")
      .version("1.0.0");

    program
      .command("group <inputs...>")
      .description("Group rows by a column; a single directory argument loads every CSV in it")
      .requiredOption("-b, --by <column>", "Column to group by")
      .option("-o, --out <dir>", "Output directory", config.output.dir)
      .option("-p, --prefix <prefix>", "File name of the combined export (without .csv)", config.output.prefix)
      .option("-u, --unmatched-prefix <prefix>", "Prefix for per-file unmatched exports", config.output.unmatchedPrefix)
      .option("--skip-unmatched", "Do not export files lacking the column")
      .action(async (inputs: string[], options: { by: string; out: string; prefix: string; unmatchedPrefix?: string; skipUnmatched?: boolean }) => {
        process.exitCode = await groupCommand(resolveAnalyzer(), inputs, options);
      });

    program
      .command("columns <inputs...>")
      .description("List the columns of each file and the columns it lacks")
      .action(async (inputs: string[]) => {
        process.exitCode = await columnsCommand(resolveAnalyzer(), inputs);
      });

    program
      .command("search <inputs...>")
      .description("Find rows containing a value (case-insensitive)")
      .option("-v, --value <text>", "Match against every column")
      .option("-w, --where <conditions...>", "Match column=value pairs (all must match)")
      .action(async (inputs: string[], options: { value?: string; where?: string[] }) => {
        process.exitCode = await searchCommand(resolveAnalyzer(), inputs, options);
      });

    await program.parseAsync();
  } catch (error) {
    console.error("Fatal error:", error);
    process.exit(1);
  }
}

void main();
