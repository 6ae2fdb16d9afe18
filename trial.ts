import { readFile } from "node:fs/promises";
import { MarkupStructureError, SessionsError, TrialParseError } from "./errors";
import {
  extractOffences,
  extractPeople,
  extractPunishments,
  extractVerdicts,
  readJoinGroups,
  requireAttribute,
  type DuplicateConflict,
  type ExtractionContext,
} from "./extract";
import { createLogger } from "./logger";
import { parseMarkup, type MarkupNode } from "./markup";
import type { OccupationTable } from "./occupations";
import { reconcileCharges } from "./reconcile";
import { TrialDataSchema, type TrialData, type TrialDate, type TrialResults } from "./schema";

const logger = createLogger("trial");

const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;

/**
 * Converts a `YYYYMMDD` literal into an ISO date, rejecting impossible
 * calendar dates.
 */
export function parseTrialDate(raw: string): TrialDate {
  const match = raw.trim().match(COMPACT_DATE);
  if (!match) {
    throw new MarkupStructureError(`Trial date "${raw}" is not in YYYYMMDD form`);
  }

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (date.getUTCMonth() !== Number(month) - 1 || date.getUTCDate() !== Number(day)) {
    throw new MarkupStructureError(`Trial date "${raw}" is not a calendar date`);
  }

  return `${year}-${month}-${day}`;
}

function readTrialId(trial: MarkupNode): string {
  return requireAttribute(trial, "id", { element: "trialAccount" });
}

function readTrialDate(trial: MarkupNode, trialId: string): TrialDate {
  const interp = trial.find("interp", { type: "date" }, { recursive: false });
  if (!interp) {
    throw new MarkupStructureError(`Trial ${trialId} has no date`, { trialId });
  }
  return parseTrialDate(requireAttribute(interp, "value", { trialId }));
}

function discard(conflict: DuplicateConflict, trialId: string): null {
  logger.error(`${conflict.kind} ${conflict.id} already exists, added twice with different values`, {
    trialId,
    entityId: conflict.id,
  });
  return null;
}

/**
 * Builds one trial record. Returns `null` when the record is unusable
 * (conflicting duplicate ids, or no charge survives reconciliation).
 * Structural problems throw, as does a record that fails
 * {@link TrialDataSchema}.
 */
export function parseTrial(trial: MarkupNode, occupations: OccupationTable): TrialData | null {
  const trialId = readTrialId(trial);
  const date = readTrialDate(trial, trialId);
  const context: ExtractionContext = { trialId, occupations };

  const people = extractPeople(trial, context);
  if (!people.ok) {
    return discard(people.conflict, trialId);
  }
  const { defendants, victims } = people.value;

  const offences = extractOffences(trial, victims, context);
  if (!offences.ok) {
    return discard(offences.conflict, trialId);
  }

  const verdicts = extractVerdicts(trial, context);
  if (!verdicts.ok) {
    return discard(verdicts.conflict, trialId);
  }

  const punishments = extractPunishments(trial, defendants, context);
  if (!punishments.ok) {
    return discard(punishments.conflict, trialId);
  }

  const { charges, corrected, dropped } = reconcileCharges(
    readJoinGroups(trial, "criminalCharge", trialId),
    { defendants, offences: offences.value, verdicts: verdicts.value },
    trialId,
  );

  if (!charges.length) {
    logger.warn(`Trial ${trialId} had no valid charges, skipping`, { trialId, dropped });
    return null;
  }
  if (dropped) {
    logger.info(`Trial ${trialId} kept ${charges.length} charges, dropped ${dropped}`, { trialId, dropped });
  }

  const result = TrialDataSchema.safeParse({
    date,
    id: trialId,
    corrected,
    defendants: Object.fromEntries(defendants),
    victims: Object.fromEntries(victims),
    offences: Object.fromEntries(offences.value),
    verdicts: Object.fromEntries(verdicts.value),
    punishments: Object.fromEntries(punishments.value),
    charges,
  });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new MarkupStructureError(`Trial ${trialId} failed validation: ${issues.join("; ")}`, { trialId });
  }
  return result.data;
}

export interface SessionsDocument {
  /**
   * Date of the first usable record, else of the first record; absent when
   * the document holds no trial records.
   */
  date?: TrialDate;
  trials: TrialResults;
}

/**
 * Parses every `trialAccount` of one sessions document. The first
 * structural failure aborts the document as a {@link TrialParseError}.
 */
export function parseSessionsDocument(xml: string, filePath: string, occupations: OccupationTable): SessionsDocument {
  const root = parseMarkup(xml);
  const trialNodes = root.findAll("div1", { type: "trialAccount" });

  const trials = trialNodes.map((node) => {
    try {
      return parseTrial(node, occupations);
    } catch (error) {
      if (error instanceof SessionsError) {
        throw new TrialParseError(filePath, node.attribute("id"), error);
      }
      throw error;
    }
  });

  const firstUsable = trials.find((trial): trial is TrialData => trial !== null);
  let date = firstUsable?.date;
  if (!date && trialNodes.length) {
    const [firstNode] = trialNodes;
    date = readTrialDate(firstNode, readTrialId(firstNode));
  }

  return { date, trials };
}

export async function parseSessionsFile(filePath: string, occupations: OccupationTable): Promise<SessionsDocument> {
  const xml = await readFile(filePath, "utf8");
  logger.debug(`Parsing ${filePath}`, { filePath });
  return parseSessionsDocument(xml, filePath, occupations);
}
