import path from "path";
import { Command } from "commander";
import pc from "picocolors";
import { readBibFile } from "../entries.js";
import { cliContext, withAction } from "./utils.js";

export function registerListCommand(program: Command) {
  program
    .command("list")
    .description("List entries with the index and key used to select them")
    .option("--bib <path>", "Path to BibTeX file", "references.bib")
    .option("--json", "Output as JSON")
    .action(withAction(async (options: { bib: string; json?: boolean }, command: Command) => {
      const { cwd } = cliContext(command);
      const bibPath = path.resolve(cwd, options.bib);
      const entries = await readBibFile(bibPath);

      if (options.json) {
        const output = entries.map((entry, i) => ({
          index: i + 1,
          key: entry.key,
          type: entry.type,
          title: entry.fields.title ?? "",
        }));
        console.log(JSON.stringify(output, null, 2));
        return;
      }

      if (!entries.length) {
        console.log(pc.yellow(`No entries found in ${options.bib}`));
        return;
      }

      console.log(pc.bold(`${options.bib}: ${entries.length} entries`));
      console.log(pc.dim("─".repeat(50)));

      const width = String(entries.length).length;
      entries.forEach((entry, i) => {
        const index = pc.dim(String(i + 1).padStart(width));
        const typeTag = pc.cyan(`[${entry.type}]`);
        console.log(`${index} ${typeTag} ${entry.key}`);
        if (entry.fields.title) {
          console.log(pc.dim(`${" ".repeat(width)}   ${entry.fields.title}`));
        }
      });
    }));
}
