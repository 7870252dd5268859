import path from "path";
import { fileURLToPath } from "url";

export const repoRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../..");
export const defaultRawDataDir = path.join(repoRoot, "raw_data");
export const defaultCleanedDataDir = path.join(repoRoot, "cleaned_data");

export function formatHumanReadableBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes < 0) return `${bytes} B`;
  if (bytes < 1024) return `${Math.round(bytes)} B`;

  const units = ["KB", "MB", "GB", "TB"] as const;
  let value = bytes;
  let unitIndex = -1;

  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024;
    unitIndex++;
  }

  const decimals = value >= 100 ? 0 : value >= 10 ? 1 : 2;
  return `${value.toFixed(decimals)} ${units[unitIndex]}`;
}

// "12 rows (4.00%)" - a zero total reports 0.00% instead of NaN%
export function formatRowShare(count: number, total: number): string {
  const pct = total > 0 ? ((count / total) * 100).toFixed(2) : "0.00";
  return `${count} rows (${pct}%)`;
}

export function formatElapsed(startTime: number): string {
  return `${((Date.now() - startTime) / 1000).toFixed(1)}s`;
}
