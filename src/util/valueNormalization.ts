import { format, isValid, parse } from 'date-fns';

/**
 * Date layouts seen in master spreadsheets and patient PDFs.
 * "2024-12-01 00:00:00", "1-Dec-2024", "12/01/2024", "Dec 1, 2024", ...
 */
const DATE_FORMATS = [
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd',
  'yyyy/MM/dd',
  'MM/dd/yyyy',
  'M/d/yyyy',
  'MM-dd-yyyy',
  'd-MMM-yyyy',
  'dd-MMM-yyyy',
  'd MMM yyyy',
  'MMM d, yyyy',
  'MMM d yyyy',
  'MMMM d, yyyy',
  'MMMM d yyyy',
];

const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Parse a date written in any supported layout to yyyy-MM-dd, or null.
 */
export function toCalendarDate(value: string): string | null {
  const text = value.trim();
  if (!text) return null;

  for (const formatStr of DATE_FORMATS) {
    const parsed = parse(text, formatStr, REFERENCE_DATE);
    if (isValid(parsed)) {
      return format(parsed, 'yyyy-MM-dd');
    }
  }
  return null;
}

/**
 * Strip currency formatting: "$1,200.50" → 1200.5. Null when not a number.
 */
export function toAmount(value: string): number | null {
  const cleaned = value.replace(/[$,\s]/g, '');
  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) return null;
  return Number(cleaned);
}

/** Case, whitespace and punctuation removed; letters and digits of any script kept */
export function toComparableText(value: string): string {
  return value.toLowerCase().replace(/[^\p{L}\p{N}]/gu, '');
}

export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === '' || /^(n\/?a|none|null|-)$/i.test(value.trim());
}

/**
 * True when two values only differ in presentation. Amounts are compared as
 * numbers and dates as calendar days; text comparison only applies when
 * neither side parses as one of those.
 */
export function isFormattingOnlyDifference(masterValue: string, documentValue: string): boolean {
  if (isBlank(masterValue) || isBlank(documentValue)) return true;

  const masterAmount = toAmount(masterValue);
  const documentAmount = toAmount(documentValue);
  if (masterAmount !== null && documentAmount !== null) {
    return masterAmount === documentAmount;
  }

  const masterDate = toCalendarDate(masterValue);
  const documentDate = toCalendarDate(documentValue);
  if (masterDate !== null && documentDate !== null) {
    return masterDate === documentDate;
  }

  const masterText = toComparableText(masterValue);
  return masterText !== '' && masterText === toComparableText(documentValue);
}
