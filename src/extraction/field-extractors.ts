/**
 * Field extractors
 * Pattern-based readers for the agreement fields the letter needs.
 */

import type { SourceDocumentText } from "../types";
import type { CalendarDate } from "./calendar-date";
import { compareDates, createCalendarDate } from "./calendar-date";
import { DecimalAmount } from "./decimal-amount";

// word boundaries that also treat Cyrillic letters as word characters
const CASE_NUM_PATTERN = /(?<![\p{L}\p{N}_])0+(\d{5,})(?![\p{L}\p{N}_])/u;
const CASE_NUM_FALLBACK_PATTERN = /(?<![\p{L}\p{N}_])\d{6,9}(?![\p{L}\p{N}_])/u;
const AMOUNT_PATTERNS = [
  /(?:amount of|USD|\$)\s*([0-9][0-9 ,.]*)/gi,
  /USD\s*\$?\s*([0-9][0-9 ,.]*)/gi,
];
const NON_DIGITS_PATTERN = /[^\d.]/g;
const UA_PURPOSE_PATTERN = /у вигляді\s+([^.]+)\./iu;
const DATE_US_PATTERN =
  /(?<![\p{L}\p{N}_])(\d{1,2})\/(\d{1,2})\/(\d{4})(?![\p{L}\p{N}_])/gu;

export interface AgreementFields {
  caseNumber: string | null;
  amount: DecimalAmount | null;
  date: CalendarDate | null;
  purpose: string | null;
}

export type RequiredField = "caseNumber" | "amount" | "date";

/**
 * Case number from the header band: a zero-padded number loses its padding,
 * otherwise the first 6-9 digit number is taken.
 */
export function findCaseNumber(headerText: string): string | null {
  const padded = CASE_NUM_PATTERN.exec(headerText);
  if (padded?.[1]) {
    return padded[1];
  }
  const fallback = CASE_NUM_FALLBACK_PATTERN.exec(headerText);
  return fallback ? BigInt(fallback[0]).toString() : null;
}

/**
 * First amount after "amount of", "USD" or "$" that parses as a decimal
 */
export function findAmount(text: string): DecimalAmount | null {
  for (const pattern of AMOUNT_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const digits = (match[1] ?? "").replace(NON_DIGITS_PATTERN, "");
      const amount = DecimalAmount.parse(digits);
      if (amount) {
        return amount;
      }
    }
  }
  return null;
}

/**
 * Latest valid M/D/YYYY date in the text
 */
export function findLatestDate(text: string): CalendarDate | null {
  let latest: CalendarDate | null = null;
  for (const match of text.matchAll(DATE_US_PATTERN)) {
    const date = createCalendarDate(
      Number(match[3]),
      Number(match[1]),
      Number(match[2])
    );
    if (date && (!latest || compareDates(date, latest) > 0)) {
      latest = date;
    }
  }
  return latest;
}

/**
 * "у вигляді ..." phrase up to the next period
 */
export function findPurpose(text: string): string | null {
  const match = UA_PURPOSE_PATTERN.exec(text);
  return match?.[1] ? `у вигляді ${match[1].trim()}` : null;
}

export function extractAgreementFields(source: SourceDocumentText): AgreementFields {
  return {
    caseNumber: findCaseNumber(source.firstPageHeaderText),
    amount: findAmount(source.firstPageText),
    date: findLatestDate(source.lastPageText),
    purpose: findPurpose(source.fullText),
  };
}

export function listMissingFields(fields: AgreementFields): RequiredField[] {
  const missing: RequiredField[] = [];
  if (!fields.caseNumber) missing.push("caseNumber");
  if (!fields.amount) missing.push("amount");
  if (!fields.date) missing.push("date");
  return missing;
}
