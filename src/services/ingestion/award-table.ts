/**
 * Award Table Reader
 *
 * Reads the award export as CSV (header row required) and maps its
 * columns onto AwardRecord fields. Blank cells become absent values.
 *
 * @module services/ingestion/award-table
 */

import { existsSync, readFileSync } from 'fs';
import Papa from 'papaparse';
import { tryParseAmount, type AwardRecord, type FundingAmount } from '../../models/grant-graph.js';

type TextField = Exclude<keyof AwardRecord, 'amount'>;

/** Export column name for every text field of AwardRecord */
export const AWARD_COLUMNS: Readonly<Record<TextField, string>> = {
  awardId: 'Award ID',
  title: 'Award Title',
  awardDate: 'Award Date',
  startDate: 'Start Date',
  endDate: 'End Date',
  active: 'Active',
  url: 'Award URL',
  people: 'PI/CoPI',
  organization: 'Award Organization',
  state: 'State',
  county: 'County',
  programs: 'TIP Programs',
  technologyAreas: 'Key Technology Areas',
};

export const AMOUNT_COLUMN = 'Total Intended Amount (USD)';

const TEXT_FIELDS: readonly TextField[] = [
  'awardId',
  'title',
  'awardDate',
  'startDate',
  'endDate',
  'active',
  'url',
  'people',
  'organization',
  'state',
  'county',
  'programs',
  'technologyAreas',
];

export interface AwardTable {
  records: AwardRecord[];
  /** Header names as they appear in the file */
  columns: string[];
  /** Rows papaparse reported as malformed (still mapped where possible) */
  parse_warnings: number;
}

function cell(row: Record<string, string | undefined>, column: string): string | undefined {
  const value = row[column];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Numeric amount when the cell parses, otherwise the raw text so the
 * value survives for inspection; aggregations coerce it to 0.
 */
export function coerceAmount(raw: string | undefined): FundingAmount | undefined {
  if (raw === undefined) return undefined;
  return tryParseAmount(raw) ?? raw;
}

export function mapAwardRow(row: Record<string, string | undefined>): AwardRecord {
  const record: AwardRecord = {};
  for (const field of TEXT_FIELDS) {
    const value = cell(row, AWARD_COLUMNS[field]);
    if (value !== undefined) {
      record[field] = value;
    }
  }
  const amount = coerceAmount(cell(row, AMOUNT_COLUMN));
  if (amount !== undefined) {
    record.amount = amount;
  }
  return record;
}

/** Parse CSV text into award records */
export function parseAwardTable(text: string): AwardTable {
  const result = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const columns = result.meta.fields ?? [];
  if (!columns.includes(AWARD_COLUMNS.awardId)) {
    throw new Error(`Award table has no "${AWARD_COLUMNS.awardId}" column`);
  }
  if (result.errors.length > 0) {
    console.error(`[AwardTable] ${result.errors.length} malformed row(s): ${result.errors[0].message}`);
  }

  return {
    records: result.data.map(mapAwardRow),
    columns,
    parse_warnings: result.errors.length,
  };
}

/**
 * @throws Error when the file does not exist or lacks the award ID column
 */
export function readAwardTable(filePath: string): AwardTable {
  if (!existsSync(filePath)) {
    throw new Error(`Award table not found: ${filePath}`);
  }
  console.error(`[AwardTable] Loading ${filePath}`);
  const table = parseAwardTable(readFileSync(filePath, 'utf-8').replace(/^\uFEFF/, ''));
  console.error(`[AwardTable] Loaded ${table.records.length} records`);
  return table;
}
