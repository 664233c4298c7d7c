import { expect, test, describe } from "vitest";
import { DecimalAmount } from "../src/extraction/decimal-amount";
import {
  addDays,
  compareDates,
  createCalendarDate,
  formatMonth,
  formatUkrainianDate,
  formatYearMonth,
  type CalendarDate,
} from "../src/extraction/calendar-date";

function amount(text: string): DecimalAmount {
  const parsed = DecimalAmount.parse(text);
  if (!parsed) {
    throw new Error(`fixture ${text} does not parse`);
  }
  return parsed;
}

function date(year: number, month: number, day: number): CalendarDate {
  const created = createCalendarDate(year, month, day);
  if (!created) {
    throw new Error(`fixture ${year}-${month}-${day} is not a date`);
  }
  return created;
}

describe("DecimalAmount", () => {
  test("parses digits with an optional fraction", () => {
    expect(amount("0025000").toString()).toBe("25000");
    expect(amount(".5").toString()).toBe("0.5");
    expect(amount("7.").toString()).toBe("7");
    expect(DecimalAmount.parse("")).toBeNull();
    expect(DecimalAmount.parse(".")).toBeNull();
    expect(DecimalAmount.parse("1.2.3")).toBeNull();
  });

  test("wholeUnits truncates", () => {
    expect(amount("25000.99").wholeUnits()).toBe("25000");
    expect(amount("0.99").wholeUnits()).toBe("0");
  });

  test("formatGrouped groups thousands with two decimals", () => {
    expect(amount("1234567.891").formatGrouped()).toBe("1 234 567.89");
    expect(amount("25000").formatGrouped()).toBe("25 000.00");
    expect(amount("999.5").formatGrouped()).toBe("999.50");
    expect(amount("1000").formatGrouped(" ")).toBe("1 000.00");
  });

  test("rounds half to even at the cent", () => {
    expect(amount("0.125").toFixed2()).toEqual({ whole: "0", cents: "12" });
    expect(amount("0.135").toFixed2()).toEqual({ whole: "0", cents: "14" });
    expect(amount("0.1251").toFixed2()).toEqual({ whole: "0", cents: "13" });
    expect(amount("9.995").toFixed2()).toEqual({ whole: "10", cents: "00" });
  });
});

describe("Calendar dates", () => {
  test("rejects impossible days", () => {
    expect(createCalendarDate(2023, 2, 29)).toBeNull();
    expect(createCalendarDate(2024, 2, 29)).toEqual({ year: 2024, month: 2, day: 29 });
    expect(createCalendarDate(2024, 13, 1)).toBeNull();
    expect(createCalendarDate(0, 1, 1)).toBeNull();
  });

  test("addDays crosses month and year ends", () => {
    expect(addDays(date(2024, 2, 28), 2)).toEqual({ year: 2024, month: 3, day: 1 });
    expect(addDays(date(2023, 12, 30), 3)).toEqual({ year: 2024, month: 1, day: 2 });
  });

  test("compareDates orders by year, month, then day", () => {
    expect(compareDates(date(2024, 3, 7), date(2024, 3, 5))).toBeGreaterThan(0);
    expect(compareDates(date(2023, 12, 31), date(2024, 1, 1))).toBeLessThan(0);
    expect(compareDates(date(2024, 1, 1), date(2024, 1, 1))).toBe(0);
  });

  test("formats for the letter", () => {
    const signed = date(2024, 3, 7);
    expect(formatUkrainianDate(signed)).toBe("«07» березня 2024 року");
    expect(formatUkrainianDate(date(2025, 11, 21))).toBe("«21» листопада 2025 року");
    expect(formatYearMonth(signed)).toBe("24-03");
    expect(formatYearMonth(date(2005, 10, 1))).toBe("05-10");
    expect(formatMonth(signed)).toBe("03");
  });
});
