/**
 * Reads an integer variable. Unset means `fallback`; anything outside
 * [min, max] also means `fallback`, with a warning pushed to `warnings`.
 */
export function readInt(
  raw: string | undefined,
  name: string,
  fallback: number,
  min: number,
  max: number,
  warnings: string[]
): number {
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    warnings.push(`Invalid ${name} "${raw}" — using ${fallback}.`);
    return fallback;
  }
  return value;
}
