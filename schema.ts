import { z } from "zod";

/**
 * Social classification of an occupation, looked up by its normalized name.
 */
export const OccupationSchema = z.object({
  /**
   * Normalized (title-cased) occupation name.
   */
  name: z.string().min(1),
  /**
   * Whether the occupation counts as working class, when the table says.
   */
  workingClass: z.boolean().optional(),
  /**
   * Whether the occupation counts as skilled, when the table says.
   */
  skilled: z.boolean().optional(),
});

export const PersonSchema = z.object({
  /**
   * Element id, unique within one trial record.
   */
  id: z.string().min(1),
  name: z.string(),
  gender: z.string().optional(),
  age: z.number().int().nonnegative().optional(),
  /**
   * Either the classified occupation or, when the table has no entry, the
   * normalized free text.
   */
  occupation: z.union([z.string(), OccupationSchema]).optional(),
});

export const OffenceSchema = z.object({
  id: z.string().min(1),
  category: z.string().min(1),
  subcategory: z.string().optional(),
  description: z.string(),
  victims: z.array(PersonSchema),
});

export const VerdictSchema = z.object({
  id: z.string().min(1),
  /**
   * Open domain: `guilty` and `notGuilty` are common, but `miscVerdict`,
   * `specialVerdict` and others occur.
   */
  category: z.string().min(1),
  subcategory: z.string().optional(),
});

export const PunishmentSchema = z.object({
  id: z.string().min(1),
  category: z.string().min(1),
  subcategory: z.string().optional(),
  description: z.string(),
  defendants: z.array(PersonSchema),
});

/**
 * Some defendants accused of some offences, settled by exactly one verdict.
 */
export const ChargeSchema = z.object({
  defendants: z.array(PersonSchema).min(1),
  offences: z.array(OffenceSchema).min(1),
  verdict: VerdictSchema,
});

/**
 * ISO calendar date (`YYYY-MM-DD`).
 */
export const TrialDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

export const TrialDataSchema = z.object({
  date: TrialDateSchema,
  id: z.string().min(1),
  /**
   * Set when at least one emitted charge used a substituted reference.
   */
  corrected: z.boolean(),
  defendants: z.record(z.string(), PersonSchema),
  victims: z.record(z.string(), PersonSchema),
  offences: z.record(z.string(), OffenceSchema),
  verdicts: z.record(z.string(), VerdictSchema),
  punishments: z.record(z.string(), PunishmentSchema),
  charges: z.array(ChargeSchema).min(1),
});

export type Occupation = z.infer<typeof OccupationSchema>;
export type Person = z.infer<typeof PersonSchema>;
export type Offence = z.infer<typeof OffenceSchema>;
export type Verdict = z.infer<typeof VerdictSchema>;
export type Punishment = z.infer<typeof PunishmentSchema>;
export type Charge = z.infer<typeof ChargeSchema>;
export type TrialDate = z.infer<typeof TrialDateSchema>;
export type TrialData = z.infer<typeof TrialDataSchema>;

/**
 * Per-file parse results in document order; `null` marks a discarded record.
 */
export type TrialResults = (TrialData | null)[];

/**
 * Parse results collated by trial date.
 */
export type TrialsPerDate = Map<TrialDate, TrialResults>;
