export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function clampUnit(value: number): number {
  return clamp(value, 0, 1);
}

// Sentiment never throws: anything non-finite reads as neutral
export function normalizeSentiment(value: number): number {
  return Number.isFinite(value) ? clamp(value, -1, 1) : 0;
}
