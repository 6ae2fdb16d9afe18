import { readFile, writeFile } from "node:fs/promises";
import { stderr, stdout, exit } from "node:process";
import { Command, InvalidArgumentError } from "commander";
import { ZodError } from "zod";
import { DEFAULT_CONCURRENCY, DEFAULT_MAX_YEAR, DEFAULT_MIN_YEAR, resolveCorpusOptions } from "./config";
import { runCorpus } from "./corpus";
import { SessionsError } from "./errors";
import { formatSentenceStatistics, parseSentence, parseSentenceTable, summarizeSentenceResults } from "./sentences";
import {
  DEFAULT_OCCUPATION_SINCE_YEAR,
  countOccupations,
  formatOccupationCsv,
  formatOffenceSummaries,
  formatRunReport,
  summarizeOffences,
  summarizeRun,
} from "./summary";
import { createWorkbook, saveWorkbook, writeOffenceSheets, writeSentenceSheet, writeSummarySheet } from "./workbook";

function writeLines(lines: readonly string[]) {
  stdout.write(`${lines.join("\n")}\n`);
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

interface YearRangeOptions {
  minYear: number;
  maxYear: number;
}

interface SummarizeOptions extends YearRangeOptions {
  concurrency: number;
  occupationCsv?: string;
  outputExcel?: string;
}

interface OccupationsOptions extends YearRangeOptions {
  sinceYear: number;
}

const program = new Command();

program
  .name("session-trials")
  .description("Reads sessions trial records and reports on offences, verdicts and punishments")
  .version("0.1.0");

program
  .command("summarize")
  .description("Summarize verdicts and punishments per offence")
  .argument("<dataDir>", "directory of sessions XML files")
  .option("--min-year <year>", "first year to read", parseInteger, DEFAULT_MIN_YEAR)
  .option("--max-year <year>", "last year to read", parseInteger, DEFAULT_MAX_YEAR)
  .option("--concurrency <n>", "files parsed at once", parseInteger, DEFAULT_CONCURRENCY)
  .option("--occupation-csv <path>", "occupation classification table")
  .option("--output-excel <path>", "write a workbook with the summary and one sheet per offence")
  .action(async (dataDir: string, options: SummarizeOptions) => {
    const corpusOptions = resolveCorpusOptions({ dataDir, ...options });
    const trialsPerDate = await runCorpus(corpusOptions);

    writeLines(formatRunReport(summarizeRun(trialsPerDate)));
    const summaries = summarizeOffences(trialsPerDate);
    writeLines(formatOffenceSummaries(summaries));

    if (options.outputExcel) {
      const workbook = createWorkbook();
      writeSummarySheet(workbook, summaries, corpusOptions);
      writeOffenceSheets(workbook, trialsPerDate);
      await saveWorkbook(workbook, options.outputExcel);
    }
  });

program
  .command("occupations")
  .description("Count the occupations given by defendants and victims")
  .argument("<dataDir>", "directory of sessions XML files")
  .argument("<outputCsv>", "where to write the occupation counts")
  .option("--min-year <year>", "first year to read", parseInteger, DEFAULT_MIN_YEAR)
  .option("--max-year <year>", "last year to read", parseInteger, DEFAULT_MAX_YEAR)
  .option("--since-year <year>", "first year counted", parseInteger, DEFAULT_OCCUPATION_SINCE_YEAR)
  .action(async (dataDir: string, outputCsv: string, options: OccupationsOptions) => {
    const trialsPerDate = await runCorpus(
      resolveCorpusOptions({ dataDir, minYear: options.minYear, maxYear: options.maxYear }),
    );

    writeLines(formatRunReport(summarizeRun(trialsPerDate)));
    const census = countOccupations(trialsPerDate, { sinceYear: options.sinceYear });
    writeLines([...census.defendantsWithOccupation].map(([year, count]) => `${year}\t${count}`));
    await writeFile(outputCsv, formatOccupationCsv(census.occupations), "utf8");
  });

program
  .command("sentences")
  .description("Map sentence descriptions to approximate lengths")
  .argument("<inputCsv>", "headerless sentence,occurrences table")
  .argument("<outputExcel>", "workbook to write (.xlsx)")
  .action(async (inputCsv: string, outputExcel: string) => {
    if (!outputExcel.endsWith(".xlsx")) {
      throw new InvalidArgumentError(`Output ${outputExcel} must be an .xlsx file.`);
    }

    const rows = parseSentenceTable(await readFile(inputCsv, "utf8"));
    const results = rows.map((row) => parseSentence(row.sentence, row.occurrences));
    writeLines(formatSentenceStatistics(summarizeSentenceResults(results)));

    const workbook = createWorkbook();
    writeSentenceSheet(workbook, results);
    await saveWorkbook(workbook, outputExcel);
  });

async function main() {
  try {
    await program.parseAsync();
  } catch (error) {
    if (error instanceof ZodError) {
      stderr.write("Invalid options:\n");
      for (const issue of error.issues) {
        const path = issue.path.length ? issue.path.join(".") : "<root>";
        stderr.write(` - ${path}: ${issue.message}\n`);
      }
      exit(1);
    }
    if (error instanceof SessionsError) {
      stderr.write(`${error.message}\n`);
      exit(1);
    }

    throw error;
  }
}

main().catch((error) => {
  stderr.write(`Unexpected error: ${error instanceof Error ? error.message : String(error)}\n`);
  exit(1);
});
