import { describe, it, expect } from "vitest";
import { PlacementError, createRng } from "@gridparley/schemas";
import { placeAgents } from "./placement.js";

describe("placeAgents", () => {
  it("is deterministic for a seed", () => {
    expect(placeAgents(5, 4, createRng(42))).toEqual(placeAgents(5, 4, createRng(42)));
  });

  it("places agents on distinct in-grid cells", () => {
    const positions = placeAgents(4, 6, createRng(9));
    expect(positions).toHaveLength(6);
    const keys = new Set(positions.map((p) => `${p.x},${p.y}`));
    expect(keys.size).toBe(6);
    for (const p of positions) {
      expect(p.x).toBeGreaterThanOrEqual(0);
      expect(p.y).toBeGreaterThanOrEqual(0);
      expect(p.x).toBeLessThan(4);
      expect(p.y).toBeLessThan(4);
    }
  });

  it("can fill every cell", () => {
    const positions = placeAgents(2, 4, createRng(1));
    expect(new Set(positions.map((p) => `${p.x},${p.y}`))).toEqual(new Set(["0,0", "1,0", "0,1", "1,1"]));
  });

  it("throws PlacementError when there are more agents than cells", () => {
    expect(() => placeAgents(2, 5, createRng(1))).toThrow(PlacementError);
    expect(() => placeAgents(2, 5, createRng(1))).toThrow("Cannot place 5 agents on a 2x2 grid (4 cells)");
  });
});
