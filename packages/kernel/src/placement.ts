import type { Position } from "@gridparley/schemas";
import { PlacementError, shuffle, type RngState } from "@gridparley/schemas";

/**
 * Visits every cell in a seed-derived order and hands out the first free ones,
 * so the same seed always yields the same layout.
 */
export function placeAgents(gridSize: number, count: number, rng: RngState): Position[] {
  if (count > gridSize * gridSize) throw new PlacementError(count, gridSize);

  const cells: Position[] = [];
  for (let y = 0; y < gridSize; y++) {
    for (let x = 0; x < gridSize; x++) cells.push({ x, y });
  }

  const taken = new Set<string>();
  const placed: Position[] = [];
  for (const cell of shuffle(rng, cells)) {
    if (placed.length === count) break;
    const key = `${cell.x},${cell.y}`;
    if (taken.has(key)) continue;
    taken.add(key);
    placed.push(cell);
  }
  return placed;
}
