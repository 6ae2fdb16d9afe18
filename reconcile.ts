import { ChargeContractError } from "./errors";
import type { JoinGroup } from "./extract";
import { createLogger } from "./logger";
import type { Charge, Offence, Person, Verdict } from "./schema";

const logger = createLogger("reconcile");

export type ReferenceKind = "verdict" | "defendant" | "offence";

/**
 * What to do with one reference kind of a charge group.
 * - `use-resolved`: take the ids the group names.
 * - `substitute-singleton`: the group names none, but the record holds exactly
 *   one of the kind; use it and flag the record as corrected.
 * - `drop-charge`: the group names none and the record holds zero or several.
 * - `fatal`: the group names more than the kind allows.
 */
export type Resolution = "use-resolved" | "substitute-singleton" | "drop-charge" | "fatal";

const CARDINALITY: Record<ReferenceKind, "single" | "multiple"> = {
  verdict: "single",
  defendant: "multiple",
  offence: "multiple",
};

export function decideResolution(kind: ReferenceKind, resolvedCount: number, recordCount: number): Resolution {
  if (resolvedCount === 0) {
    return recordCount === 1 ? "substitute-singleton" : "drop-charge";
  }
  if (resolvedCount > 1 && CARDINALITY[kind] === "single") {
    return "fatal";
  }
  return "use-resolved";
}

export interface ChargeSources {
  defendants: ReadonlyMap<string, Person>;
  offences: ReadonlyMap<string, Offence>;
  verdicts: ReadonlyMap<string, Verdict>;
}

export interface Reconciliation {
  charges: Charge[];
  corrected: boolean;
  dropped: number;
}

interface Partition {
  verdict: Verdict[];
  defendant: Person[];
  offence: Offence[];
}

type Mentions = Record<ReferenceKind, number>;

function pushUnique<T extends { id: string }>(target: T[], entity: T) {
  if (!target.some((existing) => existing.id === entity.id)) {
    target.push(entity);
  }
}

/**
 * Splits a group's ids by the map they resolve in. Returns the unique
 * entities per kind, how often each kind is named, and how many ids
 * resolved at all.
 */
function partitionGroup(group: JoinGroup, sources: ChargeSources, trialId: string) {
  const partition: Partition = { verdict: [], defendant: [], offence: [] };
  const mentions: Mentions = { verdict: 0, defendant: 0, offence: 0 };
  let resolvedIds = 0;

  for (const id of group) {
    const verdict = sources.verdicts.get(id);
    const defendant = sources.defendants.get(id);
    const offence = sources.offences.get(id);
    const matches = [verdict, defendant, offence].filter((entity) => entity !== undefined).length;

    if (matches > 1) {
      throw new ChargeContractError(`Charge target ${id} resolves to more than one kind`, {
        trialId,
        targets: [...group],
      });
    }

    if (verdict) {
      pushUnique(partition.verdict, verdict);
      mentions.verdict += 1;
    } else if (defendant) {
      pushUnique(partition.defendant, defendant);
      mentions.defendant += 1;
    } else if (offence) {
      pushUnique(partition.offence, offence);
      mentions.offence += 1;
    }
    resolvedIds += matches;
  }

  return { partition, mentions, resolvedIds };
}

type ReferenceOutcome<T> = { kept: true; values: T[]; substituted: boolean } | { kept: false };

function resolveReference<T>(
  kind: ReferenceKind,
  resolved: T[],
  mentions: number,
  pool: ReadonlyMap<string, T>,
  group: JoinGroup,
  trialId: string,
): ReferenceOutcome<T> {
  const targets = group.join(" ");

  switch (decideResolution(kind, mentions, pool.size)) {
    case "use-resolved":
      return { kept: true, values: resolved, substituted: false };
    case "substitute-singleton":
      logger.warn(`Charge ${targets} had no valid ${kind}, correcting`, { trialId, kind });
      return { kept: true, values: [...pool.values()], substituted: true };
    case "drop-charge":
      logger.warn(`Charge ${targets} had no valid ${kind}, skipping`, { trialId, kind, dropped: true });
      return { kept: false };
    case "fatal":
      throw new ChargeContractError(`Charge ${targets} names ${mentions} ${kind}s, expected one`, {
        trialId,
        kind,
        targets: [...group],
      });
  }
}

/**
 * Turns `criminalCharge` join groups into charges. A group missing one kind
 * of reference is repaired when the record holds exactly one of that kind,
 * otherwise dropped. Ids that resolve nowhere are tolerated only as long as
 * a substitution stands in for each of them. Contract violations throw
 * {@link ChargeContractError}.
 */
export function reconcileCharges(
  groups: readonly JoinGroup[],
  sources: ChargeSources,
  trialId: string,
): Reconciliation {
  const charges: Charge[] = [];
  let corrected = false;
  let dropped = 0;

  for (const group of groups) {
    const { partition, mentions, resolvedIds } = partitionGroup(group, sources, trialId);
    let substitutions = 0;
    const track = <T>(outcome: ReferenceOutcome<T>): ReferenceOutcome<T> => {
      if (outcome.kept && outcome.substituted) {
        substitutions += 1;
        corrected = true;
      }
      return outcome;
    };

    // Resolved verdict, defendant, offence in that order; the first failure drops the group.
    const verdicts = track(
      resolveReference("verdict", partition.verdict, mentions.verdict, sources.verdicts, group, trialId),
    );
    if (!verdicts.kept) {
      dropped += 1;
      continue;
    }
    const defendants = track(
      resolveReference("defendant", partition.defendant, mentions.defendant, sources.defendants, group, trialId),
    );
    if (!defendants.kept) {
      dropped += 1;
      continue;
    }
    const offences = track(
      resolveReference("offence", partition.offence, mentions.offence, sources.offences, group, trialId),
    );
    if (!offences.kept) {
      dropped += 1;
      continue;
    }

    const unresolved = group.length - resolvedIds;
    if (unresolved > substitutions) {
      throw new ChargeContractError(
        `Charge ${group.join(" ")}: ${resolvedIds} of ${group.length} ids resolved`,
        { trialId, targets: [...group] },
      );
    }

    charges.push({ defendants: defendants.values, offences: offences.values, verdict: verdicts.values[0] });
  }

  return { charges, corrected, dropped };
}
