/**
 * Letter placeholders
 * Turns extracted agreement fields into the ordered token map the template
 * and the output names are filled from.
 */

import type { TokenMap } from "../core/token-map";
import { createTokenMap, extendTokenMap } from "../core/token-map";
import type { CalendarDate } from "./calendar-date";
import {
  addDays,
  formatMonth,
  formatUkrainianDate,
  formatYearMonth,
} from "./calendar-date";
import type { DecimalAmount } from "./decimal-amount";
import type { AgreementFields } from "./field-extractors";

export interface LetterValues {
  caseNumber: string;
  amount: DecimalAmount;
  date: CalendarDate;
  /** Empty when the agreement has no purpose phrase */
  purpose: string;
}

export const PLACEHOLDER_KEYS: readonly string[] = [
  "{{CASE_NUM}}",
  "{{FULL_AMOUNT_DEC}}",
  "{{FULL_AMOUNT}}",
  "{{DATE}}",
  "{{DATE+2}}",
  "{{DATE + 2}}",
  "{{DATE+3}}",
  "{{DATE + 3}}",
  "{{DATE_MM_ONLY}}",
  "{{CASE_DESCR}}",
  "{{YY_MM}}",
];

/**
 * Null when a required field is missing
 */
export function toLetterValues(fields: AgreementFields): LetterValues | null {
  if (!fields.caseNumber || !fields.amount || !fields.date) {
    return null;
  }
  return {
    caseNumber: fields.caseNumber,
    amount: fields.amount,
    date: fields.date,
    purpose: fields.purpose ?? "",
  };
}

export function buildPlaceholderMap(
  values: LetterValues,
  extra: Record<string, string> = {}
): TokenMap {
  const datePlus2 = formatUkrainianDate(addDays(values.date, 2));
  const datePlus3 = formatUkrainianDate(addDays(values.date, 3));

  const map = createTokenMap([
    ["{{CASE_NUM}}", values.caseNumber],
    ["{{FULL_AMOUNT_DEC}}", values.amount.wholeUnits()],
    ["{{FULL_AMOUNT}}", values.amount.formatGrouped()],
    ["{{DATE}}", formatUkrainianDate(values.date)],
    ["{{DATE+2}}", datePlus2],
    ["{{DATE + 2}}", datePlus2],
    ["{{DATE+3}}", datePlus3],
    ["{{DATE + 3}}", datePlus3],
    ["{{DATE_MM_ONLY}}", formatMonth(values.date)],
    ["{{CASE_DESCR}}", values.purpose],
    ["{{YY_MM}}", formatYearMonth(values.date)],
  ]);

  return extendTokenMap(map, extra);
}
