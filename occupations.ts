import { readFile } from "node:fs/promises";
import { z } from "zod";
import { parseCsv } from "./csv";
import { OccupationTableError } from "./errors";
import { normalizeTitlecase } from "./normalize";
import type { Occupation } from "./schema";

/**
 * Occupations keyed by their normalized, title-cased name.
 */
export type OccupationTable = ReadonlyMap<string, Occupation>;

const OccupationRowSchema = z.object({
  occupation: z.string(),
  classCode: z.string(),
  skillCode: z.string(),
});

type OccupationRow = z.infer<typeof OccupationRowSchema>;

const REQUIRED_COLUMNS = {
  occupation: "occupation",
  classCode: "class",
  skillCode: "skilled",
} as const;

const COLUMN_FIELDS = ["occupation", "classCode", "skillCode"] as const;

const normalizeCode = (value: string): string => value.trim().toLowerCase();

const parseClassCode = (value: string): boolean | undefined => {
  const code = normalizeCode(value);
  if (!code) {
    return undefined;
  }
  return code === "w";
};

const parseSkillCode = (value: string): boolean | undefined => {
  const code = normalizeCode(value);
  if (code === "y") {
    return true;
  }
  if (code === "n") {
    return false;
  }
  return undefined;
};

const findColumns = (header: readonly string[]): Record<keyof OccupationRow, number> => {
  const normalizedHeader = header.map((name) => name.trim().toLowerCase());
  const columns = { occupation: -1, classCode: -1, skillCode: -1 };

  for (const field of COLUMN_FIELDS) {
    const name = REQUIRED_COLUMNS[field];
    const index = normalizedHeader.indexOf(name);
    if (index === -1) {
      throw new OccupationTableError(`Occupation table is missing the "${name}" column`, {
        header: [...header],
      });
    }
    columns[field] = index;
  }

  return columns;
};

/**
 * Builds the occupation table from CSV text with `Occupation`, `class` and
 * `skilled` columns. Rows whose occupation has no letter are skipped.
 */
export const parseOccupationTable = (csvText: string): OccupationTable => {
  const [header, ...rows] = parseCsv(csvText);
  const table = new Map<string, Occupation>();
  if (!header) {
    return table;
  }

  const columns = findColumns(header);

  for (const cells of rows) {
    const row = OccupationRowSchema.parse({
      occupation: cells[columns.occupation] ?? "",
      classCode: cells[columns.classCode] ?? "",
      skillCode: cells[columns.skillCode] ?? "",
    });

    if (!/[a-zA-Z]/.test(row.occupation)) {
      continue;
    }

    const name = normalizeTitlecase(row.occupation);
    table.set(name, {
      name,
      workingClass: parseClassCode(row.classCode),
      skilled: parseSkillCode(row.skillCode),
    });
  }

  return table;
};

export const loadOccupationTable = async (path: string): Promise<OccupationTable> => {
  const csvText = await readFile(path, "utf8");
  return parseOccupationTable(csvText);
};

/**
 * Resolves a raw occupation against the table. Unknown occupations come
 * back as their normalized text; blank input yields `undefined`.
 */
export const classifyOccupation = (
  raw: string,
  table: OccupationTable,
): Occupation | string | undefined => {
  const normalized = normalizeTitlecase(raw);
  if (!normalized) {
    return undefined;
  }

  return table.get(normalized) ?? normalized;
};

export const occupationName = (occupation: Occupation | string | undefined): string | undefined =>
  typeof occupation === "string" ? occupation : occupation?.name;
