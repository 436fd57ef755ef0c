import { parse } from 'csv-parse/sync';
import { parseAmount } from './amount';
import {
  ValidationError,
  campaignValidators,
  validateCsvHeader,
  validateCsvRow,
} from './csvValidator';

/**
 * One validated recipient row
 */
export interface RecipientEntry {
  address: string;
  /** Base units */
  amount: bigint;
}

export interface ParsedCampaign {
  records: RecipientEntry[];
  totalAmount: bigint;
  numberOfRecipients: number;
  validationErrors: ValidationError[];
}

/**
 * Thrown when the upload is not parseable as CSV at all
 * (as opposed to parseable rows with invalid values)
 */
export class CsvParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CsvParseError';
  }
}

function isStringRows(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every(
    row => Array.isArray(row) && row.every(cell => typeof cell === 'string')
  );
}

function readRows(text: string): string[][] {
  let rows: unknown;
  try {
    rows = parse(text, {
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new CsvParseError(error instanceof Error ? error.message : String(error));
  }
  if (!isStringRows(rows)) {
    throw new CsvParseError('Unexpected CSV parser output');
  }
  return rows;
}

/**
 * Parse and validate a campaign CSV (columns: address, amount).
 *
 * Amounts are scaled by `decimals` into base units. Rows are kept in file
 * order; that order becomes the leaf order of the campaign's tree.
 * Duplicate addresses are compared case-insensitively, the same way
 * eligibility lookups match them.
 *
 * @throws CsvParseError when the text is not valid CSV
 */
export function parseCampaignCsv(text: string, decimals: number): ParsedCampaign {
  const rows = readRows(text);
  const validators = campaignValidators(decimals);
  const result: ParsedCampaign = {
    records: [],
    totalAmount: 0n,
    numberOfRecipients: 0,
    validationErrors: [],
  };

  const headerError = validateCsvHeader(rows[0] ?? [], validators);
  if (headerError) {
    result.validationErrors.push(headerError);
    return result;
  }

  const dataRows = rows.slice(1);
  if (dataRows.length === 0) {
    result.validationErrors.push({ row: 2, message: 'The csv file contains no recipients' });
    return result;
  }

  const seen = new Map<string, number>();

  dataRows.forEach((row, rowIndex) => {
    const errors = validateCsvRow(row, rowIndex, validators);
    if (errors.length > 0) {
      result.validationErrors.push(...errors);
      return;
    }

    const address = row[0].trim();
    const key = address.toLowerCase();
    const firstRow = seen.get(key);
    if (firstRow !== undefined) {
      result.validationErrors.push({
        row: rowIndex + 2,
        message: `Duplicated address (first seen on row ${firstRow})`,
      });
      return;
    }
    seen.set(key, rowIndex + 2);

    const amount = parseAmount(row[1].trim(), decimals);
    if (amount === undefined) {
      return;
    }
    result.records.push({ address, amount });
    result.totalAmount += amount;
  });

  result.numberOfRecipients = result.records.length;
  return result;
}
