import { isDeepStrictEqual } from "node:util";
import { MarkupStructureError } from "./errors";
import { createLogger } from "./logger";
import type { MarkupNode } from "./markup";
import { normalizeTitlecase } from "./normalize";
import { classifyOccupation, type OccupationTable } from "./occupations";
import type { Offence, Person, Punishment, Verdict } from "./schema";

const logger = createLogger("extract");

export type PersonRole = "defendantName" | "victimName";
export type JoinKind = "offenceVictim" | "defendantPunishment" | "criminalCharge";
export type EntityKind = "person" | "offence" | "verdict" | "punishment";

/**
 * Ids of the entities taking part in one relationship instance, in source order.
 */
export type JoinGroup = readonly string[];

export interface ExtractionContext {
  trialId: string;
  occupations: OccupationTable;
}

export interface DuplicateConflict {
  kind: EntityKind;
  id: string;
}

export type Extraction<T> = { ok: true; value: T } | { ok: false; conflict: DuplicateConflict };

/**
 * Append-only, id-keyed store for one trial record. Re-adding an id with an
 * identical entity is a no-op; re-adding it with a different one is a
 * conflict that invalidates the record.
 */
export class EntityArena<T> {
  private readonly entries = new Map<string, T>();

  constructor(readonly kind: EntityKind) {}

  add(id: string, entity: T): "added" | "duplicate" | "conflict" {
    const existing = this.entries.get(id);
    if (existing === undefined) {
      this.entries.set(id, entity);
      return "added";
    }
    return isDeepStrictEqual(existing, entity) ? "duplicate" : "conflict";
  }

  get(id: string): T | undefined {
    return this.entries.get(id);
  }

  get size(): number {
    return this.entries.size;
  }

  toMap(): ReadonlyMap<string, T> {
    return new Map(this.entries);
  }
}

export function requireAttribute(node: MarkupNode, name: string, context: Record<string, unknown>): string {
  const value = node.attribute(name);
  if (value === undefined) {
    throw new MarkupStructureError(`<${node.tag}> is missing its "${name}" attribute`, context);
  }
  return value;
}

/**
 * Reads the `value` of the `<interp inst=id type=…>` scoped to an element.
 * A present interp without a value is malformed.
 */
function readInterp(node: MarkupNode, id: string, type: string, trialId: string): string | undefined {
  const interp = node.find("interp", { inst: id, type });
  if (!interp) {
    return undefined;
  }
  return requireAttribute(interp, "value", { trialId, entityId: id, type });
}

function readCategory(node: MarkupNode, id: string, type: string, trialId: string): string {
  const category = readInterp(node, id, type, trialId);
  if (category === undefined) {
    throw new MarkupStructureError(`Element ${id} has no ${type}`, { trialId, entityId: id });
  }
  return category;
}

export function parseAge(raw: string): number | undefined {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  return Number(trimmed);
}

export function readJoinGroups(trial: MarkupNode, kind: JoinKind, trialId: string): JoinGroup[] {
  return trial
    .findAll("join", { result: kind })
    .map((join) => requireAttribute(join, "targets", { trialId, join: kind }).split(/\s+/).filter(Boolean));
}

/**
 * People linked to an entity: every id sharing a join group with `id` that
 * names a person of the wanted role, once each, in first-seen order.
 */
export function resolveJoinedPeople(
  id: string,
  groups: readonly JoinGroup[],
  people: ReadonlyMap<string, Person>,
): Person[] {
  const linked: Person[] = [];
  const seen = new Set<string>();

  for (const group of groups) {
    if (!group.includes(id)) {
      continue;
    }
    for (const memberId of group) {
      const person = people.get(memberId);
      if (person && !seen.has(memberId)) {
        seen.add(memberId);
        linked.push(person);
      }
    }
  }

  return linked;
}

function conflict<T>(kind: EntityKind, id: string): Extraction<T> {
  return { ok: false, conflict: { kind, id } };
}

export interface People {
  defendants: ReadonlyMap<string, Person>;
  victims: ReadonlyMap<string, Person>;
}

function readPerson(node: MarkupNode, context: ExtractionContext): Person {
  const { trialId } = context;
  const id = requireAttribute(node, "id", { trialId });

  const gender = readInterp(node, id, "gender", trialId);

  let age: number | undefined;
  const rawAge = readInterp(node, id, "age", trialId);
  if (rawAge !== undefined) {
    age = parseAge(rawAge);
    if (age === undefined) {
      logger.warn(`Person ${id} has a non-numeric age "${rawAge}"`, { trialId, entityId: id });
    }
  }

  const rawOccupation = readInterp(node, id, "occupation", trialId);

  return {
    id,
    name: normalizeTitlecase(node.text()),
    gender: gender === undefined ? undefined : normalizeTitlecase(gender),
    age,
    occupation: rawOccupation === undefined ? undefined : classifyOccupation(rawOccupation, context.occupations),
  };
}

/**
 * Defendants and victims of the record. Witnesses and other named people
 * are ignored. An id shared between the two roles must describe the same
 * person.
 */
export function extractPeople(trial: MarkupNode, context: ExtractionContext): Extraction<People> {
  const persons = new EntityArena<Person>("person");
  const byRole: Record<PersonRole, Map<string, Person>> = {
    defendantName: new Map(),
    victimName: new Map(),
  };

  for (const role of ["defendantName", "victimName"] as const) {
    for (const node of trial.findAll("persName", { type: role })) {
      const person = readPerson(node, context);
      if (persons.add(person.id, person) === "conflict") {
        return conflict(persons.kind, person.id);
      }
      byRole[role].set(person.id, persons.get(person.id) ?? person);
    }
  }

  return { ok: true, value: { defendants: byRole.defendantName, victims: byRole.victimName } };
}

export function extractOffences(
  trial: MarkupNode,
  victims: ReadonlyMap<string, Person>,
  context: ExtractionContext,
): Extraction<ReadonlyMap<string, Offence>> {
  const { trialId } = context;
  const joins = readJoinGroups(trial, "offenceVictim", trialId);
  const offences = new EntityArena<Offence>("offence");

  for (const node of trial.findAll("rs", { type: "offenceDescription" })) {
    const id = requireAttribute(node, "id", { trialId });
    const offence: Offence = {
      id,
      category: readCategory(node, id, "offenceCategory", trialId),
      subcategory: readInterp(node, id, "offenceSubcategory", trialId),
      description: normalizeTitlecase(node.text()),
      victims: resolveJoinedPeople(id, joins, victims),
    };
    if (offences.add(id, offence) === "conflict") {
      return conflict(offences.kind, id);
    }
  }

  return { ok: true, value: offences.toMap() };
}

export function extractVerdicts(trial: MarkupNode, context: ExtractionContext): Extraction<ReadonlyMap<string, Verdict>> {
  const { trialId } = context;
  const verdicts = new EntityArena<Verdict>("verdict");

  for (const node of trial.findAll("rs", { type: "verdictDescription" })) {
    const id = requireAttribute(node, "id", { trialId });
    const verdict: Verdict = {
      id,
      category: readCategory(node, id, "verdictCategory", trialId),
      subcategory: readInterp(node, id, "verdictSubcategory", trialId),
    };
    if (verdicts.add(id, verdict) === "conflict") {
      return conflict(verdicts.kind, id);
    }
  }

  return { ok: true, value: verdicts.toMap() };
}

export function extractPunishments(
  trial: MarkupNode,
  defendants: ReadonlyMap<string, Person>,
  context: ExtractionContext,
): Extraction<ReadonlyMap<string, Punishment>> {
  const { trialId } = context;
  const joins = readJoinGroups(trial, "defendantPunishment", trialId);
  const punishments = new EntityArena<Punishment>("punishment");

  for (const node of trial.findAll("rs", { type: "punishmentDescription" })) {
    const id = requireAttribute(node, "id", { trialId });
    const punishment: Punishment = {
      id,
      category: readCategory(node, id, "punishmentCategory", trialId),
      subcategory: readInterp(node, id, "punishmentSubcategory", trialId),
      description: normalizeTitlecase(node.text()),
      defendants: resolveJoinedPeople(id, joins, defendants),
    };
    if (punishments.add(id, punishment) === "conflict") {
      return conflict(punishments.kind, id);
    }
  }

  return { ok: true, value: punishments.toMap() };
}
