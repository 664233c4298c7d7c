import { expect, test, describe } from "vitest";
import {
  buildPlaceholderMap,
  PLACEHOLDER_KEYS,
  toLetterValues,
  type LetterValues,
} from "../src/extraction/placeholder-builder";
import { DecimalAmount } from "../src/extraction/decimal-amount";
import { createCalendarDate } from "../src/extraction/calendar-date";
import { renderTokens } from "../src/core/run-span-replacer";

function letterValues(purpose = "у вигляді гуманітарної допомоги"): LetterValues {
  const amount = DecimalAmount.parse("25000.50");
  const date = createCalendarDate(2024, 3, 7);
  if (!amount || !date) {
    throw new Error("invalid fixture");
  }
  return { caseNumber: "123456", amount, date, purpose };
}

describe("Placeholder builder", () => {
  test("builds every key in a fixed order", () => {
    const map = buildPlaceholderMap(letterValues());

    expect([...map.keys()]).toEqual([...PLACEHOLDER_KEYS]);
    expect(Object.fromEntries(map)).toEqual({
      "{{CASE_NUM}}": "123456",
      "{{FULL_AMOUNT_DEC}}": "25000",
      "{{FULL_AMOUNT}}": "25 000.50",
      "{{DATE}}": "«07» березня 2024 року",
      "{{DATE+2}}": "«09» березня 2024 року",
      "{{DATE + 2}}": "«09» березня 2024 року",
      "{{DATE+3}}": "«10» березня 2024 року",
      "{{DATE + 3}}": "«10» березня 2024 року",
      "{{DATE_MM_ONLY}}": "03",
      "{{CASE_DESCR}}": "у вигляді гуманітарної допомоги",
      "{{YY_MM}}": "24-03",
    });
  });

  test("appends extra placeholders without overriding extracted ones", () => {
    const map = buildPlaceholderMap(letterValues(), {
      "{{BANK}}": "Test Bank",
      "{{CASE_NUM}}": "ignored",
    });

    expect(map.get("{{CASE_NUM}}")).toBe("123456");
    expect([...map.keys()].slice(-1)).toEqual(["{{BANK}}"]);
  });

  test("renders the default folder name", () => {
    const map = buildPlaceholderMap(letterValues());
    expect(renderTokens("{{YY_MM}} Нова ХХХ {{FULL_AMOUNT_DEC}} №{{CASE_NUM}} Хелп", map)).toBe(
      "24-03 Нова ХХХ 25000 №123456 Хелп"
    );
  });

  test("toLetterValues needs case number, amount and date", () => {
    const { caseNumber, amount, date } = letterValues();

    expect(toLetterValues({ caseNumber, amount, date, purpose: null })).toEqual({
      caseNumber,
      amount,
      date,
      purpose: "",
    });
    expect(toLetterValues({ caseNumber: null, amount, date, purpose: "x" })).toBeNull();
    expect(toLetterValues({ caseNumber, amount: null, date, purpose: "x" })).toBeNull();
  });
});
