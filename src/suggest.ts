const MAX_SUGGESTION_DISTANCE = 3;

export function levenshteinDistance(left: string, right: string): number {
  const cols = right.length + 1;
  let previousRow: number[] = Array.from({ length: cols }, (_unused, index) => index);

  for (let row = 1; row <= left.length; row += 1) {
    const currentRow: number[] = new Array<number>(cols).fill(0);
    currentRow[0] = row;

    for (let col = 1; col <= right.length; col += 1) {
      const substitutionCost = left[row - 1] === right[col - 1] ? 0 : 1;
      const insertCost = (currentRow[col - 1] ?? Number.POSITIVE_INFINITY) + 1;
      const deleteCost = (previousRow[col] ?? Number.POSITIVE_INFINITY) + 1;
      const replaceCost = (previousRow[col - 1] ?? Number.POSITIVE_INFINITY) + substitutionCost;
      currentRow[col] = Math.min(insertCost, deleteCost, replaceCost);
    }

    previousRow = currentRow;
  }

  return previousRow[right.length] ?? 0;
}

/**
 * Returns the candidate closest to `value`, or undefined when nothing is
 * within a few edits. Ties go to the alphabetically first candidate.
 */
export function closestMatch(
  value: string,
  candidates: Iterable<string>
): string | undefined {
  let best: { candidate: string; distance: number } | undefined;
  for (const candidate of candidates) {
    const distance = levenshteinDistance(value.toLowerCase(), candidate.toLowerCase());
    if (
      !best ||
      distance < best.distance ||
      (distance === best.distance && candidate.localeCompare(best.candidate) < 0)
    ) {
      best = { candidate, distance };
    }
  }
  if (!best) return undefined;
  const limit = Math.min(MAX_SUGGESTION_DISTANCE, Math.max(1, Math.floor(value.length / 2)));
  return best.distance <= limit ? best.candidate : undefined;
}

export function didYouMean(
  value: string,
  candidates: Iterable<string>
): string | undefined {
  const match = closestMatch(value, candidates);
  return match === undefined ? undefined : `Did you mean '${match}'?`;
}

export function nearestBound(
  value: number,
  min: number | undefined,
  max: number | undefined
): number | undefined {
  if (min !== undefined && value < min) return min;
  if (max !== undefined && value > max) return max;
  return undefined;
}
