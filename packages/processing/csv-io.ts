import { parse as parseStream, type Options as CsvParseOptions } from "csv-parse";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { globSync } from "glob";
import { createReadStream } from "node:fs";
import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "path";
import { z } from "zod";
import { coerceStationRows } from "./coerce";
import { TRIP_COLUMNS, type RawRow, type StationRecord, type TripRecord } from "./trip-types";
import { formatHumanReadableBytes } from "./utils";

// Layout on disk:
// - <raw>/<City>/trip_data/<YYYYMM>/*.csv (or a single <YYYYMM>-combined.csv)
// - <raw>/<City>/station_data/stations.csv
// - <cleaned>/<City>/<City>_cleaned_trips.csv

const RawRowSchema = z.record(z.string());
const RawRowsSchema = z.array(RawRowSchema);

const CSV_OPTIONS: CsvParseOptions = {
  columns: true,
  skip_empty_lines: true,
  bom: true,
};

// Whole-file read; fine for station lists and cleaned output, not for monthly trip dumps
export async function readCsvRows(filePath: string): Promise<RawRow[]> {
  const content = await readFile(filePath, "utf-8");
  const records: unknown = parse(content, CSV_OPTIONS);
  return RawRowsSchema.parse(records);
}

/** Yields rows one at a time so multi-GB trip files never sit in memory as one string. */
export async function* streamCsvRows(filePath: string): AsyncGenerator<RawRow> {
  const parser = parseStream(CSV_OPTIONS);
  const input = createReadStream(filePath);
  // pipe() does not forward source errors; without this a missing file never settles
  input.on("error", (err) => parser.destroy(err));
  input.pipe(parser);
  for await (const record of parser) {
    const row: unknown = record;
    yield RawRowSchema.parse(row);
  }
}

export function tripCsvDir(data: { rawDataDir: string; city: string; month: string }): string {
  return path.join(data.rawDataDir, data.city, "trip_data", data.month);
}

export function stationCsvPath(data: { rawDataDir: string; city: string }): string {
  return path.join(data.rawDataDir, data.city, "station_data", "stations.csv");
}

export function cleanedTripsPath(data: { cleanedDataDir: string; city: string }): string {
  return path.join(data.cleanedDataDir, data.city, `${data.city}_cleaned_trips.csv`);
}

// Prefers the combined monthly file; otherwise every CSV in the month directory, in name order
export function findTripCsvFiles(data: { rawDataDir: string; city: string; month: string }): string[] {
  const monthDir = tripCsvDir(data);
  const csvFiles = globSync("**/*.csv", {
    cwd: monthDir,
    absolute: true,
    nodir: true,
    ignore: ["**/__MACOSX/**", "**/._*"],
  }).sort();

  const combined = csvFiles.find((file) => path.basename(file) === `${data.month}-combined.csv`);
  if (combined) return [combined];

  if (csvFiles.length === 0) {
    throw new Error(`No trip CSV files found in ${monthDir}`);
  }
  return csvFiles;
}

export async function readTripRows(filePaths: readonly string[]): Promise<RawRow[]> {
  const rows: RawRow[] = [];
  for (const filePath of filePaths) {
    for await (const row of streamCsvRows(filePath)) {
      rows.push(row);
    }
  }
  return rows;
}

export async function readStations(filePath: string): Promise<StationRecord[]> {
  return coerceStationRows(await readCsvRows(filePath));
}

// Naive "YYYY-MM-DD HH:MM:SS[.mmm]", the same wall-clock form the feeds use
export function formatTimestamp(date: Date): string {
  const iso = date.toISOString();
  const base = `${iso.slice(0, 10)} ${iso.slice(11, 19)}`;
  return date.getUTCMilliseconds() === 0 ? base : `${base}.${iso.slice(20, 23)}`;
}

function formatCell(value: string | number | Date | null): string {
  if (value === null) return "";
  if (value instanceof Date) return formatTimestamp(value);
  return String(value);
}

export function serializeTrips(trips: readonly TripRecord[]): string {
  const rows = trips.map((trip) =>
    Object.fromEntries(TRIP_COLUMNS.map((column) => [column, formatCell(trip[column])]))
  );
  return stringify(rows, { header: true, columns: [...TRIP_COLUMNS] });
}

export async function writeCleanedTrips(data: {
  cleanedDataDir: string;
  city: string;
  trips: readonly TripRecord[];
}): Promise<string> {
  const { city, trips } = data;
  const filePath = cleanedTripsPath(data);

  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, serializeTrips(trips), "utf-8");

  const { size } = await stat(filePath);
  console.log(`Cleaned data for ${city} saved to ${filePath} (${formatHumanReadableBytes(size)})`);
  return filePath;
}
