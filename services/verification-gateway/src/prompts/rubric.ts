import type { Rubric, RubricDimension } from "./types.js";

export function dimensionMaximum(dimension: RubricDimension): number {
  return Math.max(0, ...dimension.levels.map((level) => level.points));
}

export function rubricMaximum(rubric: Rubric): number {
  return rubric.dimensions.reduce((total, dimension) => total + dimensionMaximum(dimension), 0);
}

export function passesRubric(rubric: Rubric, total: number): boolean {
  return total >= rubric.passThreshold;
}

export function assertRubric(rubric: Rubric): void {
  const max = rubricMaximum(rubric);
  if (rubric.passThreshold <= 0 || rubric.passThreshold > max) {
    throw new Error(`Pass threshold ${rubric.passThreshold} must fall within 1-${max}`);
  }
  for (const dimension of rubric.dimensions) {
    if (!dimension.levels.some((level) => level.points === 0)) {
      throw new Error(`Rubric dimension ${dimension.name} has no zero level`);
    }
  }
}
