export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function roundTo(value: number, digits: number): number {
  if (!Number.isFinite(value)) {
    return value;
  }
  return Number(value.toFixed(digits));
}
