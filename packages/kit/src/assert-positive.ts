/** Throws if value is not a positive safe integer. Used for capacities and intervals. */
export function assertPositiveInt(value: number, label: string): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`${label}: expected positive integer, got ${value}`);
  }
  return value;
}
