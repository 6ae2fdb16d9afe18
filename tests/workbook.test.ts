import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import ExcelJS from "exceljs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Person, TrialData } from "../schema";
import { parseSentence } from "../sentences";
import { summarizeOffences } from "../summary";
import {
  createWorkbook,
  sanitizeSheetName,
  saveWorkbook,
  sentenceRow,
  writeOffenceSheets,
  writeSentenceSheet,
  writeSummarySheet,
} from "../workbook";

const ann: Person = {
  id: "d1",
  name: "Ann Lee",
  gender: "Female",
  age: 30,
  occupation: { name: "Labourer", workingClass: true, skilled: false },
};

function trial(id: string, offence: { category: string; subcategory?: string }, verdict: string): TrialData {
  const charged = { id: "o1", ...offence, description: "", victims: [] };
  return {
    date: "1845-01-06",
    id,
    corrected: false,
    defendants: { d1: ann },
    victims: {},
    offences: { o1: charged },
    verdicts: { v1: { id: "v1", category: verdict } },
    punishments: {
      p1: { id: "p1", category: "transport", description: "Transported For Seven Years", defendants: [ann] },
    },
    charges: [{ defendants: [ann], offences: [charged], verdict: { id: "v1", category: verdict } }],
  };
}

const trialsPerDate = new Map([
  [
    "1845-01-06",
    [
      trial("t1", { category: "theft", subcategory: "pocketpicking" }, "guilty"),
      null,
      trial("t2", { category: "theft", subcategory: "simpleLarceny" }, "notGuilty"),
      trial("t3", { category: "breakingPeace/riot" }, "guilty"),
    ],
  ],
]);

describe("sanitizeSheetName", () => {
  it("replaces forbidden characters and truncates", () => {
    expect(sanitizeSheetName("breakingPeace/riot?")).toBe("breakingPeace_riot_");
    expect(sanitizeSheetName("a".repeat(40))).toHaveLength(31);
  });

  it("keeps names unique regardless of case", () => {
    expect(sanitizeSheetName("Theft", new Set(["theft"]))).toBe("Theft (2)");
  });
});

describe("writeSummarySheet", () => {
  it("lays subcategories of one category side by side", () => {
    const workbook = createWorkbook();
    const sheet = writeSummarySheet(workbook, summarizeOffences(trialsPerDate), { minYear: 1840, maxYear: 1850 });

    expect(sheet.getCell("A1").value).toBe("Offence Summary");
    expect(sheet.getCell("B2").value).toBe(1840);
    expect(sheet.getCell("B3").value).toBe(1850);

    // breakingPeace/riot sorts first and fills rows 5 to 16.
    expect(sheet.getCell("A5").value).toBe("breakingPeace/riot");
    expect(sheet.getCell("B5").value).toBe("-");
    expect(sheet.getCell("B6").value).toBe(1);
    expect(sheet.getCell("B7").value).toBe(0);

    expect(sheet.getCell("A18").value).toBe("theft");
    expect(sheet.getCell("B18").value).toBe("pocketpicking");
    expect(sheet.getCell("E18").value).toBe("theft");
    expect(sheet.getCell("F18").value).toBe("simpleLarceny");
    expect(sheet.getCell("F20").value).toBe(1);
  });

  it("stacks blocks when asked", () => {
    const workbook = createWorkbook();
    const sheet = writeSummarySheet(workbook, summarizeOffences(trialsPerDate), {
      minYear: 1840,
      maxYear: 1850,
      categoryOnOneRow: false,
    });

    expect(sheet.getCell("A18").value).toBe("theft");
    expect(sheet.getCell("E18").value).toBeNull();
  });
});

describe("writeOffenceSheets", () => {
  it("adds a sheet per offence category with a row per defendant", () => {
    const workbook = createWorkbook();
    const sheets = writeOffenceSheets(workbook, trialsPerDate);

    expect(sheets.map((sheet) => sheet.name)).toEqual(["breakingPeace_riot", "theft"]);

    const theft = workbook.getWorksheet("theft");
    expect(theft?.getRow(2).values).toEqual([
      undefined,
      "1845-01-06",
      "t1",
      "Ann Lee",
      "Female",
      30,
      "Labourer",
      true,
      false,
      "pocketpicking",
      "guilty",
      undefined,
      "Transported For Seven Years",
    ]);
    expect(theft?.getCell("J3").value).toBe("notGuilty");
  });
});

describe("sentenceRow", () => {
  it("leaves the error column empty for parsed sentences", () => {
    expect(sentenceRow(parseSentence("Confined Six Months", 4))).toEqual([
      "Confined Six Months",
      4,
      "Six Month",
      6,
      "month",
      6,
      null,
    ]);
  });

  it("fills only the error column for failures", () => {
    expect(sentenceRow(parseSentence("Death", 2))).toEqual(["Death", 2, null, null, null, null, "Found no units"]);
  });
});

describe("saveWorkbook", () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), "workbook-"));
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  it("writes the sentence mapping to disk", async () => {
    const workbook = createWorkbook();
    writeSentenceSheet(workbook, [parseSentence("Confined Six Months", 4), parseSentence("Death", 2)]);
    const path = join(outputDir, "mapping.xlsx");

    await saveWorkbook(workbook, path);

    const reread = new ExcelJS.Workbook();
    await reread.xlsx.readFile(path);
    const sheet = reread.getWorksheet("Sentence Mapping");
    expect(sheet?.getCell("A1").value).toBe("Sentence");
    expect(sheet?.getCell("A3").value).toBe("Death");
    expect(sheet?.getCell("G3").value).toBe("Found no units");
  });
});
