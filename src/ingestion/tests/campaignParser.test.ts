import { parseCampaignCsv, CsvParseError } from '../campaignParser';
import { AMOUNT_FORMAT_MESSAGE } from '../csvValidator';
import { makeAddress } from '../../merkle/tests/fixtures';

const ALICE = makeAddress(1);
const BOB = makeAddress(2);

function csv(...lines: string[]): string {
  return lines.join('\n');
}

describe('parseCampaignCsv', () => {
  it('should parse valid rows into base units in file order', () => {
    const parsed = parseCampaignCsv(csv('address,amount', `${ALICE},100.0`, `${BOB},200.5`), 2);

    expect(parsed.validationErrors).toEqual([]);
    expect(parsed.records).toEqual([
      { address: ALICE, amount: 10_000n },
      { address: BOB, amount: 20_050n },
    ]);
    expect(parsed.totalAmount).toBe(30_050n);
    expect(parsed.numberOfRecipients).toBe(2);
  });

  it('should accept a header in any case and surrounding spaces', () => {
    const parsed = parseCampaignCsv(csv(' Address , AMOUNT ', ` ${ALICE} , 1 `), 0);
    expect(parsed.validationErrors).toEqual([]);
    expect(parsed.records).toEqual([{ address: ALICE, amount: 1n }]);
  });

  it('should skip blank lines', () => {
    const parsed = parseCampaignCsv(csv('address,amount', `${ALICE},1`, '', `${BOB},2`, ''), 0);
    expect(parsed.numberOfRecipients).toBe(2);
  });

  it('should stop at a wrong header', () => {
    const parsed = parseCampaignCsv(csv('address,amount_invalid', `${ALICE},100.0`), 2);
    expect(parsed.records).toEqual([]);
    expect(parsed.validationErrors).toHaveLength(1);
    expect(parsed.validationErrors[0].row).toBe(1);
  });

  it('should reject a header with a missing column', () => {
    const parsed = parseCampaignCsv(csv('address', ALICE, BOB), 2);
    expect(parsed.validationErrors).toEqual([{ row: 1, message: 'Insufficient columns' }]);
  });

  it('should reject an empty upload', () => {
    expect(parseCampaignCsv('', 2).validationErrors).toEqual([{ row: 1, message: 'Insufficient columns' }]);
  });

  it('should reject a header without recipients', () => {
    expect(parseCampaignCsv('address,amount\n', 2).validationErrors).toEqual([
      { row: 2, message: 'The csv file contains no recipients' },
    ]);
  });

  it('should report a row with a missing column', () => {
    const parsed = parseCampaignCsv(csv('address,amount', ALICE, `${BOB},200.0`), 2);
    expect(parsed.validationErrors).toEqual([{ row: 2, message: 'Insufficient columns' }]);
    expect(parsed.records).toEqual([{ address: BOB, amount: 20_000n }]);
  });

  it('should report invalid addresses', () => {
    const parsed = parseCampaignCsv(csv('address,amount', '0xThisIsNotAnAddress,100.0', `${BOB},200.0`), 2);
    expect(parsed.validationErrors).toEqual([{ row: 2, message: 'Invalid Solana address' }]);
  });

  it('should report duplicated addresses', () => {
    const parsed = parseCampaignCsv(csv('address,amount', `${ALICE},100.0`, `${ALICE},200.0`), 2);
    expect(parsed.validationErrors).toEqual([
      { row: 3, message: 'Duplicated address (first seen on row 2)' },
    ]);
    expect(parsed.numberOfRecipients).toBe(1);
  });

  it('should report invalid amounts', () => {
    const parsed = parseCampaignCsv(
      csv('address,amount', `${ALICE},alphanumeric_amount`, `${BOB},-1`, `${makeAddress(3)},0`, `${makeAddress(4)},1.1234`),
      2
    );
    expect(parsed.validationErrors).toEqual([
      { row: 2, message: AMOUNT_FORMAT_MESSAGE },
      { row: 3, message: AMOUNT_FORMAT_MESSAGE },
      { row: 4, message: 'The amount cannot be 0' },
      { row: 5, message: AMOUNT_FORMAT_MESSAGE },
    ]);
    expect(parsed.records).toEqual([]);
    expect(parsed.totalAmount).toBe(0n);
  });

  it('should throw on text that is not CSV', () => {
    expect(() => parseCampaignCsv('address,amount\n"unterminated,1', 2)).toThrow(CsvParseError);
  });
});
