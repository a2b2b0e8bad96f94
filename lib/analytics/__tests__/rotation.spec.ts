import { describe, it, expect } from "vitest";
import { groupByUsername } from "@/lib/analytics/aggregate";
import { resolveConfig } from "@/lib/analytics/config";
import {
  classifyRotation,
  denseRankDescending,
  herfindahlRandomness,
  rotationCallouts,
  scoreRotation,
} from "@/lib/analytics/rotation";
import { fact, hskFacts, userActions } from "./helpers";

const config = resolveConfig();

describe("rotation bands", () => {
  it("uses inclusive lower, exclusive upper edges", () => {
    const cases: [number, string][] = [
      [0, "Very Low"],
      [0.199, "Very Low"],
      [0.2, "Low"],
      [0.399, "Low"],
      [0.4, "Moderate"],
      [0.599, "Moderate"],
      [0.6, "High"],
      [1, "High"],
    ];
    for (const [rate, label] of cases) {
      expect(classifyRotation(rate, config.bands)).toBe(label);
    }
  });

  it("follows configured edges", () => {
    const bands = resolveConfig({ bands: { low: 0.1, moderate: 0.5, high: 0.9 } }).bands;
    expect(classifyRotation(0.15, bands)).toBe("Low");
    expect(classifyRotation(0.85, bands)).toBe("Moderate");
  });
});

describe("randomness", () => {
  it("is the Herfindahl complement of the visit distribution", () => {
    expect(herfindahlRandomness([5])).toBe(0);
    expect(herfindahlRandomness([1, 1, 1, 1])).toBe(0.75);
    expect(herfindahlRandomness([2, 1, 1])).toBe(0.625);
    expect(herfindahlRandomness([])).toBe(0);
  });

  it("dense-ranks descending with shared ranks for ties", () => {
    expect(denseRankDescending([0.5, 0.75, 0.5, 0])).toEqual([2, 1, 2, 3]);
  });
});

describe("scoreRotation", () => {
  it("scores a single-room user", () => {
    const facts = hskFacts([
      "101,King,VC,Dirty,Clean,Ann,Bob,alice,01/05/2025 08:00",
      "101,King,VC,Clean,Clean,Ann,Bob,alice,01/05/2025 09:00",
      "101,King,VC,Clean,Inspected,Ann,Bob,alice,01/05/2025 10:00",
    ]);
    expect(groupByUsername(facts)).toEqual([
      { key: "alice", rows: 3, unique_rooms: 1, changed: 2, change_rate: 0.6667 },
    ]);
    expect(scoreRotation(facts, config)).toEqual([
      {
        username: "alice",
        total_actions: 3,
        unique_rooms: 1,
        status_changes: 2,
        room_uniqueness_rate: 0.333,
        rotation_quality: "Low",
        room_randomness: 0,
        room_randomness_rank: 1,
      },
    ]);
  });

  it("gives 1 − 1/N randomness to a user visiting N rooms once each", () => {
    const [four] = scoreRotation(userActions("dana", 4, 4), config);
    expect(four.room_uniqueness_rate).toBe(1);
    expect(four.room_randomness).toBe(0.75);
    const [three] = scoreRotation(userActions("eve", 3, 3), config);
    expect(three.room_randomness).toBe(0.6667);
  });

  it("keeps both metrics within [0, 1]", () => {
    const facts = [...userActions("a", 7, 3), ...userActions("b", 1, 1), ...userActions("c", 40, 9)];
    for (const r of scoreRotation(facts, config)) {
      expect(r.room_uniqueness_rate).toBeGreaterThanOrEqual(0);
      expect(r.room_uniqueness_rate).toBeLessThanOrEqual(1);
      expect(r.room_randomness).toBeGreaterThanOrEqual(0);
      expect(r.room_randomness).toBeLessThanOrEqual(1);
    }
  });

  it("orders by rate ascending, then volume descending", () => {
    const facts = [...userActions("a", 10, 2), ...userActions("b", 20, 4), ...userActions("c", 10, 10)];
    expect(scoreRotation(facts, config).map((r) => r.username)).toEqual(["b", "a", "c"]);
  });

  it("shares randomness ranks between equal distributions", () => {
    const facts = [...userActions("a", 4, 2), ...userActions("b", 6, 3), ...userActions("c", 8, 4)];
    const ranks = Object.fromEntries(scoreRotation(facts, config).map((r) => [r.username, r.room_randomness_rank]));
    expect(ranks).toEqual({ c: 1, b: 2, a: 3 });

    const tied = scoreRotation([...userActions("x", 2, 2), ...userActions("y", 4, 2)], config);
    expect(tied.map((r) => r.room_randomness_rank)).toEqual([1, 1]);
  });

  it("counts status changes separately from actions", () => {
    const [r] = scoreRotation([fact("f", "1"), fact("f", "1", false), fact("f", "2", false)], config);
    expect(r.total_actions).toBe(3);
    expect(r.status_changes).toBe(1);
    expect(r.unique_rooms).toBe(2);
  });
});

describe("rotationCallouts", () => {
  it("never flags users below the volume floor", () => {
    const facts = [...userActions("tiny", 5, 1), ...userActions("heavy", 12, 6)];
    const records = scoreRotation(facts, config);
    expect(records[0].username).toBe("tiny");
    expect(rotationCallouts(records, config).map((r) => r.username)).toEqual(["heavy"]);
  });

  it("keeps the worst eight", () => {
    const facts = Array.from({ length: 10 }, (_, i) => userActions(`u${i}`, 10, i + 1)).flat();
    const callouts = rotationCallouts(scoreRotation(facts, config), config);
    expect(callouts).toHaveLength(8);
    expect(callouts.map((r) => r.username)).toEqual(["u0", "u1", "u2", "u3", "u4", "u5", "u6", "u7"]);
  });
});
