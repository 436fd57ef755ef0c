export { MAX_AMOUNT, amountPattern, parseAmount, formatAmount } from './amount';

export {
  ValidationError,
  AddressKind,
  ColumnValidator,
  AMOUNT_FORMAT_MESSAGE,
  addressColumn,
  amountColumn,
  campaignValidators,
  validateCell,
  validateHeaderCell,
  validateCsvHeader,
  validateCsvRow,
} from './csvValidator';

export { RecipientEntry, ParsedCampaign, CsvParseError, parseCampaignCsv } from './campaignParser';
