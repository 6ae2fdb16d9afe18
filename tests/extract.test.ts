import { describe, expect, it } from "vitest";
import { MarkupStructureError } from "../errors";
import {
  EntityArena,
  extractOffences,
  extractPeople,
  extractVerdicts,
  parseAge,
  readJoinGroups,
  resolveJoinedPeople,
  type ExtractionContext,
} from "../extract";
import { parseMarkup, type MarkupNode } from "../markup";
import type { Person } from "../schema";

const context: ExtractionContext = { trialId: "t1", occupations: new Map() };

function trial(body: string): MarkupNode {
  const node = parseMarkup(`<div1 type="trialAccount" id="t1">${body}</div1>`).find("div1");
  if (!node) {
    throw new Error("no trial element");
  }
  return node;
}

describe("EntityArena", () => {
  it("reports added, duplicate and conflicting entries", () => {
    const arena = new EntityArena<Person>("person");

    expect(arena.add("d1", { id: "d1", name: "Ann Lee" })).toBe("added");
    expect(arena.add("d1", { id: "d1", name: "Ann Lee" })).toBe("duplicate");
    expect(arena.add("d1", { id: "d1", name: "Ann Leigh" })).toBe("conflict");
    expect(arena.size).toBe(1);
    expect(arena.get("d1")).toEqual({ id: "d1", name: "Ann Lee" });
  });
});

describe("parseAge", () => {
  it("accepts digits only", () => {
    expect(parseAge(" 19 ")).toBe(19);
    expect(parseAge("19 years")).toBeUndefined();
    expect(parseAge("-4")).toBeUndefined();
  });
});

describe("readJoinGroups", () => {
  it("splits targets on whitespace", () => {
    const node = trial(`<join result="offenceVictim" targets="o1  w1
      w2"/><join result="criminalCharge" targets="d1 o1 v1"/>`);

    expect(readJoinGroups(node, "offenceVictim", "t1")).toEqual([["o1", "w1", "w2"]]);
  });

  it("requires a targets attribute", () => {
    const node = trial(`<join result="criminalCharge"/>`);

    expect(() => readJoinGroups(node, "criminalCharge", "t1")).toThrow(MarkupStructureError);
  });
});

describe("resolveJoinedPeople", () => {
  it("keeps people of the role once each in first-seen order", () => {
    const people = new Map<string, Person>([
      ["w1", { id: "w1", name: "Ann Lee" }],
      ["w2", { id: "w2", name: "Tom Lee" }],
    ]);

    const linked = resolveJoinedPeople(
      "o1",
      [
        ["o1", "w2", "d1"],
        ["o2", "w1"],
        ["w1", "o1", "w2"],
      ],
      people,
    );

    expect(linked.map((person) => person.id)).toEqual(["w2", "w1"]);
  });
});

describe("extractPeople", () => {
  it("splits defendants from victims and ignores other names", () => {
    const result = extractPeople(
      trial(`
        <persName id="d1" type="defendantName">ann  LEE<interp inst="d1" type="gender" value="female"/></persName>
        <persName id="w1" type="victimName">tom lee</persName>
        <persName id="x1" type="witnessName">jane doe</persName>`),
      context,
    );

    expect(result).toEqual({
      ok: true,
      value: {
        defendants: new Map([["d1", { id: "d1", name: "Ann Lee", gender: "Female" }]]),
        victims: new Map([["w1", { id: "w1", name: "Tom Lee" }]]),
      },
    });
  });

  it("fails when one id names two different people", () => {
    const result = extractPeople(
      trial(`
        <persName id="p1" type="defendantName">ann lee</persName>
        <persName id="p1" type="victimName">tom lee</persName>`),
      context,
    );

    expect(result).toEqual({ ok: false, conflict: { kind: "person", id: "p1" } });
  });
});

describe("extractOffences", () => {
  it("attaches victims named in offence joins", () => {
    const victims = new Map<string, Person>([["w1", { id: "w1", name: "Tom Lee" }]]);
    const result = extractOffences(
      trial(`
        <rs id="o1" type="offenceDescription">stealing  a HAT
          <interp inst="o1" type="offenceCategory" value="theft"/>
          <interp inst="o1" type="offenceSubcategory" value="simpleLarceny"/>
        </rs>
        <join result="offenceVictim" targets="o1 w1 d1"/>`),
      victims,
      context,
    );

    expect(result.ok && result.value.get("o1")).toEqual({
      id: "o1",
      category: "theft",
      subcategory: "simpleLarceny",
      description: "Stealing A Hat",
      victims: [{ id: "w1", name: "Tom Lee" }],
    });
  });

  it("requires an offence category", () => {
    expect(() => extractOffences(trial(`<rs id="o1" type="offenceDescription">x</rs>`), new Map(), context)).toThrow(
      "Element o1 has no offenceCategory",
    );
  });

  it("requires a value on a present interp", () => {
    const node = trial(`<rs id="o1" type="offenceDescription">x<interp inst="o1" type="offenceCategory"/></rs>`);

    expect(() => extractOffences(node, new Map(), context)).toThrow('<interp> is missing its "value" attribute');
  });
});

describe("extractVerdicts", () => {
  it("keeps open-ended verdict categories", () => {
    const result = extractVerdicts(
      trial(`<rs id="v1" type="verdictDescription">
        <interp inst="v1" type="verdictCategory" value="miscVerdict"/>
        <interp inst="v1" type="verdictSubcategory" value="unfitToPlead"/>
      </rs>`),
      context,
    );

    expect(result).toEqual({
      ok: true,
      value: new Map([["v1", { id: "v1", category: "miscVerdict", subcategory: "unfitToPlead" }]]),
    });
  });
});
