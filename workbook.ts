import ExcelJS from "exceljs";
import { createLogger } from "./logger";
import { occupationName } from "./occupations";
import type { Person, TrialData, TrialsPerDate } from "./schema";
import type { SentenceResult } from "./sentences";
import { sortedSummaries, type OffenceSummary } from "./summary";

const logger = createLogger("workbook");

type Row = ExcelJS.CellValue[];

const BREAKDOWN_COLUMNS = ["Category", "Subcategory", "Count"];

export function createWorkbook(): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();
  return workbook;
}

/**
 * Writes `rows` as an Excel table whose header sits at (`row`, `column`).
 * Tables need at least one body row, so an empty breakdown is written as a
 * bare header.
 */
function writeTable(
  sheet: ExcelJS.Worksheet,
  name: string,
  row: number,
  column: number,
  headers: readonly string[],
  rows: readonly Row[],
): void {
  if (!rows.length) {
    headers.forEach((header, offset) => {
      const cell = sheet.getCell(row, column + offset);
      cell.value = header;
      cell.font = { bold: true };
    });
    return;
  }

  sheet.addTable({
    name,
    ref: sheet.getCell(row, column).address,
    headerRow: true,
    style: { theme: "TableStyleMedium2", showRowStripes: true },
    columns: headers.map((header) => ({ name: header, filterButton: true })),
    rows: rows.map((values) => [...values]),
  });
}

export interface SummarySheetOptions {
  minYear: number;
  maxYear: number;
  /**
   * Lay the subcategories of one category side by side (default) instead
   * of stacking every block.
   */
  categoryOnOneRow?: boolean;
}

/**
 * Builds the `Summary` sheet: a block per offence with its guilty counts
 * and the verdict and punishment breakdowns.
 */
export function writeSummarySheet(
  workbook: ExcelJS.Workbook,
  summaries: ReadonlyMap<string, OffenceSummary>,
  { minYear, maxYear, categoryOnOneRow = true }: SummarySheetOptions,
): ExcelJS.Worksheet {
  const sheet = workbook.addWorksheet("Summary");

  sheet.getCell("A1").value = "Offence Summary";
  sheet.getCell("A1").font = { bold: true, size: 14 };
  sheet.getCell("A2").value = "Start Year";
  sheet.getCell("B2").value = minYear;
  sheet.getCell("A3").value = "End Year";
  sheet.getCell("B3").value = maxYear;

  const byCategory = new Map<string, OffenceSummary[]>();
  for (const summary of sortedSummaries(summaries)) {
    const group = byCategory.get(summary.key.category) ?? [];
    group.push(summary);
    byCategory.set(summary.key.category, group);
  }

  let startRow = 5;
  let tableIndex = 0;
  for (const group of byCategory.values()) {
    let column = 1;
    const groupEndRows: number[] = [];

    for (const summary of group) {
      tableIndex += 1;
      sheet.getCell(startRow, column).value = summary.key.category;
      sheet.getCell(startRow, column).font = { bold: true };
      sheet.getCell(startRow, column + 1).value = summary.key.subcategory ?? "-";
      sheet.getCell(startRow + 1, column).value = "Guilty Verdicts: ";
      sheet.getCell(startRow + 1, column + 1).value = summary.verdictCategories.get("guilty");
      sheet.getCell(startRow + 2, column).value = "Not Guilty Verdicts: ";
      sheet.getCell(startRow + 2, column + 1).value = summary.verdictCategories.get("notGuilty");

      const verdictRows = summary.verdicts
        .mostCommon()
        .map(([verdict, count]): Row => [verdict.category, verdict.subcategory ?? "-", count]);
      sheet.getCell(startRow + 4, column).value = "Verdict Breakdown: ";
      writeTable(sheet, `Verdicts${tableIndex}`, startRow + 5, column, BREAKDOWN_COLUMNS, verdictRows);
      const verdictEnd = startRow + 6 + verdictRows.length;

      const punishmentRows = summary.punishments
        .mostCommon()
        .map(([punishment, count]): Row => [punishment.category, punishment.subcategory ?? "-", count]);
      sheet.getCell(verdictEnd + 1, column).value = "Punishment Breakdown: ";
      writeTable(sheet, `Punishments${tableIndex}`, verdictEnd + 2, column, BREAKDOWN_COLUMNS, punishmentRows);
      const punishmentEnd = verdictEnd + 3 + punishmentRows.length;

      if (categoryOnOneRow) {
        column += 4;
        groupEndRows.push(punishmentEnd + 2);
      } else {
        startRow = punishmentEnd + 2;
      }
    }

    if (categoryOnOneRow) {
      startRow = Math.max(...groupEndRows);
    }
  }

  logger.debug(`Summary sheet holds ${summaries.size} offence blocks`);
  return sheet;
}

const INVALID_SHEET_CHARACTERS = /[[\]:*?/\\]/g;
const MAX_SHEET_NAME = 31;

/**
 * Makes a worksheet name Excel accepts: no `[]:*?/\`, at most 31
 * characters, unique (case-insensitively) among `taken`.
 */
export function sanitizeSheetName(name: string, taken: ReadonlySet<string> = new Set()): string {
  const base = name.replace(INVALID_SHEET_CHARACTERS, "_").trim().slice(0, MAX_SHEET_NAME) || "Sheet";
  const lowerTaken = new Set([...taken].map((entry) => entry.toLowerCase()));

  let candidate = base;
  for (let suffix = 2; lowerTaken.has(candidate.toLowerCase()); suffix += 1) {
    const tail = ` (${suffix})`;
    candidate = `${base.slice(0, MAX_SHEET_NAME - tail.length)}${tail}`;
  }
  return candidate;
}

export const OFFENCE_SHEET_COLUMNS = [
  "Date",
  "Trial",
  "Defendant",
  "Gender",
  "Age",
  "Occupation",
  "Working Class",
  "Skilled",
  "Offence Subcategory",
  "Verdict",
  "Verdict Subcategory",
  "Punishments",
];

function punishmentDescriptions(trial: TrialData, defendant: Person): string {
  return Object.values(trial.punishments)
    .filter((punishment) => punishment.defendants.some((person) => person.id === defendant.id))
    .map((punishment) => punishment.description)
    .join("; ");
}

function defendantCells(defendant: Person): Row {
  const { occupation } = defendant;
  const classified = typeof occupation === "object" ? occupation : undefined;
  return [
    defendant.name,
    defendant.gender ?? null,
    defendant.age ?? null,
    occupationName(occupation) ?? null,
    classified?.workingClass ?? null,
    classified?.skilled ?? null,
  ];
}

/**
 * One sheet per offence category, one row per defendant of each offence of
 * each charge, dates in ascending order.
 */
export function writeOffenceSheets(workbook: ExcelJS.Workbook, trialsPerDate: TrialsPerDate): ExcelJS.Worksheet[] {
  const rowsByCategory = new Map<string, Row[]>();
  const dates = [...trialsPerDate.keys()].sort();

  for (const date of dates) {
    for (const trial of trialsPerDate.get(date) ?? []) {
      if (!trial) {
        continue;
      }
      for (const charge of trial.charges) {
        for (const offence of charge.offences) {
          const rows = rowsByCategory.get(offence.category) ?? [];
          for (const defendant of charge.defendants) {
            rows.push([
              trial.date,
              trial.id,
              ...defendantCells(defendant),
              offence.subcategory ?? null,
              charge.verdict.category,
              charge.verdict.subcategory ?? null,
              punishmentDescriptions(trial, defendant),
            ]);
          }
          rowsByCategory.set(offence.category, rows);
        }
      }
    }
  }

  const taken = new Set(workbook.worksheets.map((sheet) => sheet.name));
  return [...rowsByCategory.keys()].sort().map((category, index) => {
    const name = sanitizeSheetName(category, taken);
    taken.add(name);
    const sheet = workbook.addWorksheet(name);
    writeTable(sheet, `Offences${index + 1}`, 1, 1, OFFENCE_SHEET_COLUMNS, rowsByCategory.get(category) ?? []);
    return sheet;
  });
}

export const SENTENCE_SHEET_COLUMNS = [
  "Sentence",
  "Occurrences",
  "Length - Phrase",
  "Length - Number",
  "Length - Unit",
  "Months (Approx.)",
  "Parse Error",
];

export function sentenceRow(result: SentenceResult): Row {
  if (result.kind === "parsed") {
    return [
      result.sentence,
      result.occurrences,
      result.extractedPhrase,
      result.phraseNum,
      result.phraseUnit,
      result.approxMonths,
      null,
    ];
  }
  return [result.sentence, result.occurrences, null, null, null, null, result.error];
}

export function writeSentenceSheet(workbook: ExcelJS.Workbook, results: readonly SentenceResult[]): ExcelJS.Worksheet {
  const sheet = workbook.addWorksheet("Sentence Mapping");
  writeTable(sheet, "SentenceMapping", 1, 1, SENTENCE_SHEET_COLUMNS, results.map(sentenceRow));
  return sheet;
}

export async function saveWorkbook(workbook: ExcelJS.Workbook, path: string): Promise<void> {
  await workbook.xlsx.writeFile(path);
  logger.info(`Wrote ${path}`, { sheets: workbook.worksheets.map((sheet) => sheet.name) });
}
