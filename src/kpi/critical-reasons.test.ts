import { describe, expect, it } from "vitest";
import { discharge } from "../testing/fixtures.js";
import { criticalReasons } from "./critical-reasons.js";

describe("criticalReasons", () => {
  it("counts each reason once per baby, most frequent first", () => {
    const records = [
      discharge({ UID: "C1", criticalReasons: ["weightLoss>2%", "GA", "GA"] }),
      discharge({ UID: "C2", criticalReasons: "['GA']" }),
      discharge({ UID: "C1", criticalReasons: ["Other"] }),
      discharge({ UID: "C3" }),
    ];

    const result = criticalReasons(records);

    expect(Object.keys(result.reasons)).toEqual(["GA", "weightLoss>2%"]);
    expect(result.reasons.GA).toEqual({ count: 2, uids: ["C1", "C2"] });
    expect(result.totalBabiesWithReasons).toBe(2);
    expect(result.totalUniqueReasons).toBe(2);
    expect(result.totalDischarges).toBe(3);
  });
});
