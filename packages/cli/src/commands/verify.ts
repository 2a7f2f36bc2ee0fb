import fs from "fs/promises";
import path from "path";
import { Command } from "commander";
import pc from "picocolors";
import { CitationVerifier, TOOL_VERSION } from "@bibverify/refcheck";
import { loadSettings } from "../config.js";
import { readBibFile, selectEntries } from "../entries.js";
import { parseReportFormat, renderReport } from "../reports/index.js";
import { cliContext, colorStatus, printSummary, timestampedLog, withAction } from "./utils.js";

interface VerifyOptions {
  bib: string;
  start?: number;
  end?: number;
  key?: string;
  output?: string;
  format: string;
  verbose?: boolean;
}

const runVerify = withAction(async (options: VerifyOptions, command: Command) => {
  const { cwd } = cliContext(command);
  const format = parseReportFormat(options.format);
  const settings = await loadSettings({ cwd });

  const bibPath = path.resolve(cwd, options.bib);
  const entries = await readBibFile(bibPath);
  const selected = selectEntries(entries, options);

  const verifier = new CitationVerifier({
    ...settings,
    log: options.verbose ? timestampedLog : undefined,
  });

  console.error(pc.bold(`Verifying ${selected.length} citations...`));
  const results = await verifier.verifyEntries(selected, (result, index, total) => {
    console.error(`  [${index + 1}/${total}] ${result.key} ${colorStatus(result.verification.overallStatus)}`);
  });

  const report = renderReport(results, format, {
    generatedAt: new Date(),
    bibPath,
    version: TOOL_VERSION,
  });

  if (options.output) {
    const outputPath = path.resolve(cwd, options.output);
    await fs.writeFile(outputPath, report, "utf8");
    console.error(pc.green(`\n✔ Report saved to: ${outputPath}`));
  } else {
    console.log(report);
  }

  printSummary(results);

  const fabricated = results.filter((r) => r.verification.overallStatus === "FABRICATED").length;
  if (fabricated) {
    console.error(pc.red(pc.bold(`\n⚠ ${fabricated} FABRICATED citations detected!`)));
    process.exitCode = 1;
  }
});

export function registerVerifyCommand(program: Command) {
  program
    .command("verify")
    .description("Verify citations against Crossref, doi.org and Semantic Scholar")
    .option("--bib <path>", "Path to BibTeX file", "references.bib")
    .option("--start <n>", "Start index (1-based, inclusive)", (v) => parseInt(v, 10))
    .option("--end <n>", "End index (1-based, inclusive)", (v) => parseInt(v, 10))
    .option("--key <key>", "Verify a single citation by BibTeX key")
    .option("-o, --output <file>", "Write the report to a file instead of stdout")
    .option("-f, --format <format>", "Report format: text, json, markdown/md", "markdown")
    .option("-v, --verbose", "Log every registry lookup")
    .addHelpText(
      "after",
      `
Examples:
  $ bibverify verify --start 1 --end 10
  $ bibverify verify --start 1 --end 50 --output report.md --verbose
  $ bibverify verify --key smith2023paper --format json`
    )
    .action(runVerify);
}
