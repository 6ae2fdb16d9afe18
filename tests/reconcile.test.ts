import { describe, expect, it } from "vitest";
import { ChargeContractError } from "../errors";
import { decideResolution, reconcileCharges, type ChargeSources } from "../reconcile";
import type { Offence, Person, Verdict } from "../schema";

const person = (id: string): Person => ({ id, name: id.toUpperCase() });
const offence = (id: string): Offence => ({ id, category: "theft", description: "", victims: [] });
const verdict = (id: string, category = "guilty"): Verdict => ({ id, category });

function sources(ids: { defendants?: string[]; offences?: string[]; verdicts?: string[] }): ChargeSources {
  return {
    defendants: new Map((ids.defendants ?? []).map((id) => [id, person(id)])),
    offences: new Map((ids.offences ?? []).map((id) => [id, offence(id)])),
    verdicts: new Map((ids.verdicts ?? []).map((id) => [id, verdict(id)])),
  };
}

describe("decideResolution", () => {
  it.each([
    ["verdict", 1, 1, "use-resolved"],
    ["verdict", 0, 1, "substitute-singleton"],
    ["verdict", 0, 2, "drop-charge"],
    ["verdict", 0, 0, "drop-charge"],
    ["verdict", 2, 2, "fatal"],
    ["defendant", 2, 3, "use-resolved"],
    ["defendant", 0, 1, "substitute-singleton"],
    ["offence", 3, 3, "use-resolved"],
    ["offence", 0, 4, "drop-charge"],
  ] as const)("%s with %i resolved of %i is %s", (kind, resolved, total, expected) => {
    expect(decideResolution(kind, resolved, total)).toBe(expected);
  });
});

describe("reconcileCharges", () => {
  it("uses the ids a complete group names", () => {
    const result = reconcileCharges(
      [["d1", "d2", "o1", "v1"]],
      sources({ defendants: ["d1", "d2"], offences: ["o1"], verdicts: ["v1"] }),
      "t1",
    );

    expect(result).toEqual({
      charges: [{ defendants: [person("d1"), person("d2")], offences: [offence("o1")], verdict: verdict("v1") }],
      corrected: false,
      dropped: 0,
    });
  });

  it("substitutes the only defendant of the record", () => {
    const result = reconcileCharges(
      [["o1", "v1"]],
      sources({ defendants: ["d1"], offences: ["o1"], verdicts: ["v1"] }),
      "t1",
    );

    expect(result.corrected).toBe(true);
    expect(result.charges[0].defendants).toEqual([person("d1")]);
  });

  it("drops a group whose missing offence is ambiguous", () => {
    const result = reconcileCharges(
      [
        ["d1", "v1"],
        ["d1", "o2", "v1"],
      ],
      sources({ defendants: ["d1"], offences: ["o1", "o2"], verdicts: ["v1"] }),
      "t1",
    );

    expect(result.dropped).toBe(1);
    expect(result.corrected).toBe(false);
    expect(result.charges).toEqual([{ defendants: [person("d1")], offences: [offence("o2")], verdict: verdict("v1") }]);
  });

  it("flags a substitution made for a group dropped later", () => {
    const result = reconcileCharges(
      [["d1", "d2"]],
      sources({ defendants: ["d1", "d2"], offences: ["o1", "o2"], verdicts: ["v1"] }),
      "t1",
    );

    expect(result).toEqual({ charges: [], corrected: true, dropped: 1 });
  });

  it("lists a repeated id once", () => {
    const result = reconcileCharges(
      [["d1", "d1", "o1", "v1"]],
      sources({ defendants: ["d1"], offences: ["o1"], verdicts: ["v1"] }),
      "t1",
    );

    expect(result.charges[0].defendants).toEqual([person("d1")]);
  });

  it("rejects a group naming two verdicts", () => {
    expect(() =>
      reconcileCharges(
        [["d1", "o1", "v1", "v2"]],
        sources({ defendants: ["d1"], offences: ["o1"], verdicts: ["v1", "v2"] }),
        "t1",
      ),
    ).toThrow(ChargeContractError);
  });

  it("rejects a group with ids that resolve nowhere", () => {
    expect(() =>
      reconcileCharges(
        [["d1", "o1", "v1", "x9"]],
        sources({ defendants: ["d1"], offences: ["o1"], verdicts: ["v1"] }),
        "t1",
      ),
    ).toThrow("Charge d1 o1 v1 x9: 3 of 4 ids resolved");
  });

  it("rejects a verdict id named twice", () => {
    expect(() =>
      reconcileCharges(
        [["d1", "o1", "v1", "v1"]],
        sources({ defendants: ["d1"], offences: ["o1"], verdicts: ["v1"] }),
        "t1",
      ),
    ).toThrow("Charge d1 o1 v1 v1 names 2 verdicts, expected one");
  });

  it("lets a substituted verdict stand in for an unknown id", () => {
    const result = reconcileCharges(
      [["d1", "o1", "x9"]],
      sources({ defendants: ["d1"], offences: ["o1"], verdicts: ["v1"] }),
      "t1",
    );

    expect(result).toEqual({
      charges: [{ defendants: [person("d1")], offences: [offence("o1")], verdict: verdict("v1") }],
      corrected: true,
      dropped: 0,
    });
  });

  it("rejects more unknown ids than substitutions", () => {
    expect(() =>
      reconcileCharges(
        [["o1", "v1", "x8", "x9"]],
        sources({ defendants: ["d1"], offences: ["o1"], verdicts: ["v1"] }),
        "t1",
      ),
    ).toThrow("Charge o1 v1 x8 x9: 2 of 4 ids resolved");
  });
});
