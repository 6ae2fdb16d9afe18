import { stat } from "node:fs/promises";
import { join } from "node:path";
import fg from "fast-glob";
import pLimit from "p-limit";
import type { CorpusOptions } from "./config";
import { DataPathError } from "./errors";
import { createLogger } from "./logger";
import { loadOccupationTable, type OccupationTable } from "./occupations";
import type { TrialsPerDate } from "./schema";
import { parseSessionsFile, type SessionsDocument } from "./trial";

const logger = createLogger("corpus");

const SESSION_FILE = /^(\d{4})\w+\.xml$/;

/**
 * Year embedded at the start of a sessions file name (`18340102.xml`,
 * `1845_sessions.xml`), if the name follows the pattern.
 */
export function sessionYear(fileName: string): number | undefined {
  const match = fileName.match(SESSION_FILE);
  return match ? Number(match[1]) : undefined;
}

export function isSessionFileInRange(fileName: string, minYear: number, maxYear: number): boolean {
  const year = sessionYear(fileName);
  return year !== undefined && year >= minYear && year <= maxYear;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    logger.debug(`Cannot stat ${path}`, { error: error instanceof Error ? error.message : String(error) });
    return false;
  }
}

/**
 * Sessions files directly under `dataDir` whose year lies in the inclusive
 * range, sorted by name.
 */
export async function findSessionFiles(dataDir: string, minYear: number, maxYear: number): Promise<string[]> {
  if (!(await isDirectory(dataDir))) {
    throw new DataPathError(dataDir);
  }

  const names = await fg("*.xml", { cwd: dataDir, onlyFiles: true });
  return names
    .filter((name) => isSessionFileInRange(name, minYear, maxYear))
    .sort()
    .map((name) => join(dataDir, name));
}

/**
 * Folds per-file results into a date-keyed map. Files that share a date
 * are concatenated in the order given; files without trial records are
 * left out.
 */
export function collateByDate(documents: readonly SessionsDocument[]): TrialsPerDate {
  const trialsPerDate: TrialsPerDate = new Map();

  for (const document of documents) {
    if (!document.date) {
      continue;
    }
    const existing = trialsPerDate.get(document.date);
    if (existing) {
      existing.push(...document.trials);
    } else {
      trialsPerDate.set(document.date, [...document.trials]);
    }
  }

  return trialsPerDate;
}

/**
 * Parses every selected file on a bounded pool. The first file that fails
 * rejects the whole run and queued files are not started.
 */
export async function processCorpus(
  options: Pick<CorpusOptions, "dataDir" | "minYear" | "maxYear" | "concurrency">,
  occupations: OccupationTable,
): Promise<TrialsPerDate> {
  const files = await findSessionFiles(options.dataDir, options.minYear, options.maxYear);
  logger.info(`Processing ${files.length} sessions files`, {
    dataDir: options.dataDir,
    minYear: options.minYear,
    maxYear: options.maxYear,
  });

  const limit = pLimit(options.concurrency);
  let documents: SessionsDocument[];
  try {
    documents = await Promise.all(files.map((file) => limit(() => parseSessionsFile(file, occupations))));
  } catch (error) {
    limit.clearQueue();
    throw error;
  }

  return collateByDate(documents);
}

export async function runCorpus(options: CorpusOptions): Promise<TrialsPerDate> {
  const occupations: OccupationTable = options.occupationCsv
    ? await loadOccupationTable(options.occupationCsv)
    : new Map();
  return processCorpus(options, occupations);
}
