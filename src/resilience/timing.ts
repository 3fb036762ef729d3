/**
 * Suspend the calling task for the given duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function roundMs(ms: number): number {
  return Math.round(ms * 100) / 100;
}

export function percent(numerator: number, denominator: number): number {
  return denominator > 0 ? (numerator / denominator) * 100 : 0;
}
