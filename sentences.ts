import { z } from "zod";
import { parseCsv } from "./csv";
import numberWords from "./data/number-words.json";
import { createLogger } from "./logger";

const logger = createLogger("sentences");

/**
 * Months per unit; a month is taken as 31 days or 4.5 weeks. "tear" is a
 * frequent transcription slip for "year".
 */
const UNIT_MONTHS: ReadonlyMap<string, number> = new Map([
  ["day", 1 / 31],
  ["week", 1 / 4.5],
  ["month", 1],
  ["year", 12],
  ["tear", 12],
]);

const NUMBER_VALUES: ReadonlyMap<string, number> = new Map([
  ...Object.entries(z.record(z.string(), z.number().int().positive()).parse(numberWords)),
  ...Array.from({ length: 30 }, (_, index): [string, number] => [String(index + 1), index + 1]),
]);

const alternation = (values: Iterable<string>) =>
  `(${[...values].sort((a, b) => b.length - a.length).join("|")})`;

const UNIT_PATTERN = alternation(UNIT_MONTHS.keys());
const NUMBER_UNIT_PATTERN = `\\b${alternation(NUMBER_VALUES.keys())}\\s+${UNIT_PATTERN}`;

const UNIT_RE = new RegExp(UNIT_PATTERN, "gi");
const NUMBER_UNIT_RE = new RegExp(NUMBER_UNIT_PATTERN, "i");
const CONFINED_RE = new RegExp(`^Confined\\s+${NUMBER_UNIT_PATTERN}`, "i");

export interface ParsedSentence {
  kind: "parsed";
  sentence: string;
  occurrences: number;
  extractedPhrase: string;
  phraseNum: number;
  phraseUnit: string;
  approxMonths: number;
}

export interface SentenceParseError {
  kind: "error";
  sentence: string;
  occurrences: number;
  error: string;
}

export type SentenceResult = ParsedSentence | SentenceParseError;

function parseError(sentence: string, occurrences: number, error: string): SentenceParseError {
  logger.debug(`${sentence}: ${error}`);
  return { kind: "error", sentence, occurrences, error };
}

function fromMatch(sentence: string, occurrences: number, match: RegExpMatchArray): SentenceResult {
  const phraseNum = NUMBER_VALUES.get(match[1].toLowerCase());
  const phraseUnit = match[2].toLowerCase();
  const unitMonths = UNIT_MONTHS.get(phraseUnit);
  if (phraseNum === undefined || unitMonths === undefined) {
    return parseError(sentence, occurrences, `Unrecognized phrase "${match[0]}"`);
  }

  return {
    kind: "parsed",
    sentence,
    occurrences,
    extractedPhrase: match[0],
    phraseNum,
    phraseUnit,
    approxMonths: unitMonths * phraseNum,
  };
}

/**
 * Finds the single "<number> <unit>" length in a sentence description
 * ("Transported for Seven Years"). Sentences naming several units are
 * ambiguous, except "Confined X; Y solitary" where the leading term wins.
 */
export function parseSentence(sentence: string, occurrences = 1): SentenceResult {
  const units = sentence.match(UNIT_RE) ?? [];
  if (!units.length) {
    return parseError(sentence, occurrences, "Found no units");
  }

  if (units.length > 1) {
    if (!sentence.toLowerCase().startsWith("confined")) {
      return parseError(sentence, occurrences, `Found multiple units ${units.join(", ")}, parse would be ambiguous`);
    }
    const confined = sentence.match(CONFINED_RE);
    if (!confined) {
      return parseError(sentence, occurrences, "Found multiple units, didn't fit Confined X; Y format");
    }
    return fromMatch(sentence, occurrences, confined);
  }

  const match = sentence.match(NUMBER_UNIT_RE);
  if (!match) {
    return parseError(sentence, occurrences, `Found single unit ${units[0]} but couldn't match with a number`);
  }
  return fromMatch(sentence, occurrences, match);
}

const SentenceRowSchema = z.object({
  sentence: z.string().trim().min(1),
  occurrences: z.coerce.number().int().nonnegative(),
});

export type SentenceRow = z.infer<typeof SentenceRowSchema>;

/**
 * Reads headerless `sentence,occurrences` rows. Incomplete rows and the
 * pivot table's "Grand Total" row are skipped.
 */
export function parseSentenceTable(csvText: string): SentenceRow[] {
  const rows: SentenceRow[] = [];
  for (const [sentence = "", occurrences = ""] of parseCsv(csvText)) {
    if (!occurrences.trim()) {
      continue;
    }
    const parsed = SentenceRowSchema.safeParse({ sentence, occurrences });
    if (parsed.success && parsed.data.sentence !== "Grand Total") {
      rows.push(parsed.data);
    }
  }
  return rows;
}

export interface SentenceStatistics {
  totalRows: number;
  errorRows: number;
  confinedErrorRows: number;
  totalOccurrences: number;
  missedOccurrences: number;
  missedConfinedOccurrences: number;
}

export function summarizeSentenceResults(results: readonly SentenceResult[]): SentenceStatistics {
  const errors = results.filter((result): result is SentenceParseError => result.kind === "error");
  const confinedErrors = errors.filter((result) => result.sentence.startsWith("Confined"));
  const sumOccurrences = (items: readonly SentenceResult[]) =>
    items.reduce((total, item) => total + item.occurrences, 0);

  return {
    totalRows: results.length,
    errorRows: errors.length,
    confinedErrorRows: confinedErrors.length,
    totalOccurrences: sumOccurrences(results),
    missedOccurrences: sumOccurrences(errors),
    missedConfinedOccurrences: sumOccurrences(confinedErrors),
  };
}

const percentage = (part: number, whole: number): string => `${whole ? (part * 100) / whole : 0}%`;

export function formatSentenceStatistics(stats: SentenceStatistics): string[] {
  return [
    `Missed Occurrences\t${stats.missedOccurrences}`,
    `Total Occurrences\t${stats.totalOccurrences}`,
    `Percentage Missed\t${percentage(stats.missedOccurrences, stats.totalOccurrences)}`,
    `Missed Confined Occurrences\t${stats.missedConfinedOccurrences}`,
    `Percentage Missed\t${percentage(stats.missedConfinedOccurrences, stats.totalOccurrences)}`,
    `Num Errors\t${stats.errorRows}`,
    `Total Rows\t${stats.totalRows}`,
    `Percentage Missed\t${percentage(stats.errorRows, stats.totalRows)}`,
    `Num Confined Errors\t${stats.confinedErrorRows}`,
    `Percentage Missed\t${percentage(stats.confinedErrorRows, stats.totalRows)}`,
  ];
}
