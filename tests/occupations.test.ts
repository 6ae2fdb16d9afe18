import { describe, expect, it } from "vitest";
import { OccupationTableError } from "../errors";
import { classifyOccupation, occupationName, parseOccupationTable } from "../occupations";

const TABLE_CSV = [
  "Occupation,Notes,Class,Skilled",
  "labourer,,w,y",
  '"DEALER, MARINE STORES",,m,n',
  "clerk,, ,",
  "123,,w,y",
].join("\n");

describe("parseOccupationTable", () => {
  const table = parseOccupationTable(TABLE_CSV);

  it("keys rows by title-cased occupation", () => {
    expect([...table.keys()]).toEqual(["Labourer", "Dealer, Marine Stores", "Clerk"]);
  });

  it("decodes class and skill codes", () => {
    expect(table.get("Labourer")).toEqual({ name: "Labourer", workingClass: true, skilled: true });
    expect(table.get("Dealer, Marine Stores")).toEqual({
      name: "Dealer, Marine Stores",
      workingClass: false,
      skilled: false,
    });
    expect(table.get("Clerk")).toEqual({ name: "Clerk" });
  });

  it("requires the class column", () => {
    expect(() => parseOccupationTable("Occupation,Skilled\nclerk,y")).toThrow(OccupationTableError);
  });

  it("reads headers case-insensitively", () => {
    expect(parseOccupationTable("OCCUPATION,CLASS,SKILLED\nbaker,W,Y").get("Baker")).toEqual({
      name: "Baker",
      workingClass: true,
      skilled: true,
    });
  });
});

describe("classifyOccupation", () => {
  const table = parseOccupationTable("Occupation,class,skilled\nlabourer,w,y");

  it("returns the normalized text for unknown occupations", () => {
    expect(classifyOccupation("costermonger", table)).toBe("Costermonger");
  });

  it("returns the table entry for known occupations", () => {
    expect(classifyOccupation("  LABOURER ", table)).toEqual({ name: "Labourer", workingClass: true, skilled: true });
  });

  it("returns undefined for blank input", () => {
    expect(classifyOccupation("   ", table)).toBeUndefined();
  });
});

describe("occupationName", () => {
  it("reads the name of either form", () => {
    expect(occupationName("Costermonger")).toBe("Costermonger");
    expect(occupationName({ name: "Labourer" })).toBe("Labourer");
    expect(occupationName(undefined)).toBeUndefined();
  });
});
