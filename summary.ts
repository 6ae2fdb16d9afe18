import { formatCsvRow } from "./csv";
import { occupationName } from "./occupations";
import type { Punishment, TrialData, TrialsPerDate } from "./schema";
import { parseSentence } from "./sentences";

/**
 * Occurrence counter. `mostCommon` orders by count, ties in the order the
 * values were first seen.
 */
export class Tally<T> {
  private readonly counts = new Map<string, { value: T; count: number }>();

  constructor(private readonly keyOf: (value: T) => string) {}

  add(value: T, times = 1): void {
    const key = this.keyOf(value);
    const entry = this.counts.get(key);
    if (entry) {
      entry.count += times;
    } else {
      this.counts.set(key, { value, count: times });
    }
  }

  get(value: T): number {
    return this.counts.get(this.keyOf(value))?.count ?? 0;
  }

  get size(): number {
    return this.counts.size;
  }

  mostCommon(): [T, number][] {
    return [...this.counts.values()]
      .map(({ value, count }): [T, number] => [value, count])
      .sort((a, b) => b[1] - a[1]);
  }
}

/**
 * A category with its optional subcategory, the key offences, verdicts and
 * punishments are grouped by.
 */
export interface CategoryKey {
  category: string;
  subcategory?: string;
}

const categoryKeyOf = (key: CategoryKey) => JSON.stringify([key.category, key.subcategory ?? null]);

export const formatCategoryKey = (key: CategoryKey) => `${key.category} / ${key.subcategory ?? "-"}`;

export function compareCategoryKeys(a: CategoryKey, b: CategoryKey): number {
  if (a.category !== b.category) {
    return a.category < b.category ? -1 : 1;
  }
  if (a.subcategory === b.subcategory) {
    return 0;
  }
  if (a.subcategory === undefined) {
    return -1;
  }
  if (b.subcategory === undefined) {
    return 1;
  }
  return a.subcategory < b.subcategory ? -1 : 1;
}

export interface OffenceSummary {
  key: CategoryKey;
  verdictCategories: Tally<string>;
  verdicts: Tally<CategoryKey>;
  punishments: Tally<CategoryKey>;
  /**
   * Approximate sentence lengths, in months, of the punishments counted.
   */
  numericalValues: number[];
}

const categoryOf = ({ category, subcategory }: CategoryKey): CategoryKey => ({ category, subcategory });

function punishmentsOf(trial: TrialData, defendantId: string): Punishment[] {
  return Object.values(trial.punishments).filter((punishment) =>
    punishment.defendants.some((defendant) => defendant.id === defendantId),
  );
}

/**
 * Folds every usable trial into per-offence tallies. Each offence of a
 * charge counts the charge's verdict once; punishments are counted per
 * defendant of guilty charges only.
 */
export function summarizeOffences(trialsPerDate: TrialsPerDate): Map<string, OffenceSummary> {
  const summaries = new Map<string, OffenceSummary>();

  const summaryFor = (key: CategoryKey): OffenceSummary => {
    const id = categoryKeyOf(key);
    let summary = summaries.get(id);
    if (!summary) {
      summary = {
        key,
        verdictCategories: new Tally((category) => category),
        verdicts: new Tally(categoryKeyOf),
        punishments: new Tally(categoryKeyOf),
        numericalValues: [],
      };
      summaries.set(id, summary);
    }
    return summary;
  };

  for (const trials of trialsPerDate.values()) {
    for (const trial of trials) {
      if (!trial) {
        continue;
      }

      for (const charge of trial.charges) {
        for (const offence of charge.offences) {
          const summary = summaryFor(categoryOf(offence));
          summary.verdicts.add(categoryOf(charge.verdict));
          summary.verdictCategories.add(charge.verdict.category);

          if (charge.verdict.category !== "guilty") {
            continue;
          }
          for (const defendant of charge.defendants) {
            for (const punishment of punishmentsOf(trial, defendant.id)) {
              summary.punishments.add(categoryOf(punishment));
              const sentence = parseSentence(punishment.description);
              if (sentence.kind === "parsed") {
                summary.numericalValues.push(sentence.approxMonths);
              }
            }
          }
        }
      }
    }
  }

  return summaries;
}

export function sortedSummaries(summaries: ReadonlyMap<string, OffenceSummary>): OffenceSummary[] {
  return [...summaries.values()].sort((a, b) => compareCategoryKeys(a.key, b.key));
}

export function formatOffenceSummaries(summaries: ReadonlyMap<string, OffenceSummary>): string[] {
  const lines: string[] = [];

  for (const summary of sortedSummaries(summaries)) {
    lines.push(formatCategoryKey(summary.key));
    lines.push(
      `guilty:\t${summary.verdictCategories.get("guilty")}\tnot guilty:\t${summary.verdictCategories.get("notGuilty")}`,
    );
    lines.push("Verdicts");
    for (const [verdict, count] of summary.verdicts.mostCommon()) {
      lines.push(`\t${count}\t|\t${formatCategoryKey(verdict)}`);
    }
    lines.push("Punishments (guilty verdicts only)");
    for (const [punishment, count] of summary.punishments.mostCommon()) {
      lines.push(`\t${count}\t|\t${formatCategoryKey(punishment)}`);
    }
  }

  return lines;
}

export interface RunReport {
  total: number;
  corrected: number;
  skipped: number;
  successRate: number;
}

export function summarizeRun(trialsPerDate: TrialsPerDate): RunReport {
  let total = 0;
  let corrected = 0;
  let skipped = 0;

  for (const trials of trialsPerDate.values()) {
    for (const trial of trials) {
      total += 1;
      if (!trial) {
        skipped += 1;
      } else if (trial.corrected) {
        corrected += 1;
      }
    }
  }

  return { total, corrected, skipped, successRate: total ? 100 - (100 * skipped) / total : 0 };
}

export function formatRunReport(report: RunReport): string[] {
  return [
    "Final Report:",
    `\tTotal Trials found: ${report.total}`,
    `\tCorrected (see log): ${report.corrected}`,
    `\tSkipped (see log): ${report.skipped}`,
    `\tSuccess(%): ${report.successRate}`,
  ];
}

export const DEFAULT_OCCUPATION_SINCE_YEAR = 1906;

export interface OccupationCensus {
  /**
   * Occupation names of defendants and victims.
   */
  occupations: Tally<string>;
  /**
   * Defendants who gave an occupation, per trial year.
   */
  defendantsWithOccupation: Map<number, number>;
}

export function countOccupations(
  trialsPerDate: TrialsPerDate,
  { sinceYear = DEFAULT_OCCUPATION_SINCE_YEAR }: { sinceYear?: number } = {},
): OccupationCensus {
  const occupations = new Tally<string>((name) => name);
  const defendantsWithOccupation = new Map<number, number>();

  for (const [date, trials] of trialsPerDate) {
    const year = Number(date.slice(0, 4));
    if (year < sinceYear) {
      continue;
    }

    let withOccupation = defendantsWithOccupation.get(year) ?? 0;
    for (const trial of trials) {
      if (!trial) {
        continue;
      }
      for (const person of [...Object.values(trial.defendants), ...Object.values(trial.victims)]) {
        const name = occupationName(person.occupation);
        if (name) {
          occupations.add(name);
        }
      }
      withOccupation += Object.values(trial.defendants).filter((person) => occupationName(person.occupation)).length;
    }
    defendantsWithOccupation.set(year, withOccupation);
  }

  return { occupations, defendantsWithOccupation };
}

export function formatOccupationCsv(occupations: Tally<string>): string {
  const rows = ["Occupation,Occurrences"];
  for (const [name, count] of occupations.mostCommon()) {
    if (!name || name === "No Occupation") {
      continue;
    }
    rows.push(formatCsvRow([name, count]));
  }
  return `${rows.join("\n")}\n`;
}
