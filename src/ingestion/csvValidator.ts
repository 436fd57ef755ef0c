import { isValidRecipient } from '../merkle';
import { MAX_AMOUNT, parseAmount } from './amount';

/**
 * A validation problem tied to a CSV row.
 * Rows are 1-based and the header is row 1, so data row i is row i + 2.
 */
export interface ValidationError {
  row: number;
  message: string;
}

/**
 * Supported recipient address formats
 */
export type AddressKind = 'solana';

/**
 * Column validators are a closed set of variants, one per expected column
 */
export type ColumnValidator =
  | { kind: 'address'; addressKind: AddressKind }
  | { kind: 'amount'; decimals: number };

export const AMOUNT_FORMAT_MESSAGE =
  'Amounts should be positive, in normal notation, with an optional decimal point and a maximum number of decimals as provided by the query parameter.';

export function addressColumn(addressKind: AddressKind = 'solana'): ColumnValidator {
  return { kind: 'address', addressKind };
}

export function amountColumn(decimals: number): ColumnValidator {
  return { kind: 'amount', decimals };
}

/**
 * The campaign CSV layout: address, amount
 */
export function campaignValidators(decimals: number): ColumnValidator[] {
  return [addressColumn(), amountColumn(decimals)];
}

function isValidAddress(address: string, addressKind: AddressKind): boolean {
  switch (addressKind) {
    case 'solana':
      return isValidRecipient(address);
  }
}

/**
 * Validate one cell. rowIndex is the 0-based data row.
 */
export function validateCell(
  validator: ColumnValidator,
  cell: string,
  rowIndex: number
): ValidationError | undefined {
  const row = rowIndex + 2;

  switch (validator.kind) {
    case 'address':
      if (!isValidAddress(cell, validator.addressKind)) {
        return { row, message: 'Invalid Solana address' };
      }
      return undefined;

    case 'amount': {
      const amount = parseAmount(cell, validator.decimals);
      if (amount === undefined) {
        return { row, message: AMOUNT_FORMAT_MESSAGE };
      }
      if (amount === 0n) {
        return { row, message: 'The amount cannot be 0' };
      }
      if (amount > MAX_AMOUNT) {
        return { row, message: 'The amount exceeds the maximum supported value' };
      }
      return undefined;
    }
  }
}

/**
 * Validate one header cell (case-insensitive)
 */
export function validateHeaderCell(validator: ColumnValidator, cell: string): ValidationError | undefined {
  const expected = validator.kind;
  if (cell.toLowerCase() !== expected) {
    return {
      row: 1,
      message: `CSV header invalid. The csv header should contain \`${expected}\` column. The ${expected} column is missing`,
    };
  }
  return undefined;
}

/**
 * Validate the header row; returns the first problem found
 */
export function validateCsvHeader(
  header: ReadonlyArray<string>,
  validators: ReadonlyArray<ColumnValidator>
): ValidationError | undefined {
  if (header.length < validators.length) {
    return { row: 1, message: 'Insufficient columns' };
  }
  for (let i = 0; i < validators.length; i++) {
    const error = validateHeaderCell(validators[i], header[i].trim());
    if (error) {
      return error;
    }
  }
  return undefined;
}

/**
 * Validate a data row; returns every problem found in it
 */
export function validateCsvRow(
  row: ReadonlyArray<string>,
  rowIndex: number,
  validators: ReadonlyArray<ColumnValidator>
): ValidationError[] {
  if (row.length < validators.length) {
    return [{ row: rowIndex + 2, message: 'Insufficient columns' }];
  }

  const errors: ValidationError[] = [];
  validators.forEach((validator, i) => {
    const error = validateCell(validator, row[i].trim(), rowIndex);
    if (error) {
      errors.push(error);
    }
  });
  return errors;
}
