/**
 * Exact decimal amounts
 * Amounts are kept as digit strings so that rounding and truncation never go
 * through binary floating point.
 */

const DECIMAL_TEXT = /^(\d*)(?:\.(\d*))?$/;

export class DecimalAmount {
  private constructor(
    /** Integer digits without leading zeros, "0" for zero */
    readonly integerDigits: string,
    readonly fractionDigits: string
  ) {}

  /**
   * Parses digits with at most one decimal point ("25000", "25000.5", ".5",
   * "7."). Returns null for anything else, including "" and ".".
   */
  static parse(text: string): DecimalAmount | null {
    const match = DECIMAL_TEXT.exec(text);
    if (!match) return null;

    const integerPart = match[1] ?? "";
    const fractionPart = match[2] ?? "";
    if (integerPart.length === 0 && fractionPart.length === 0) {
      return null;
    }

    return new DecimalAmount(integerPart.replace(/^0+/, "") || "0", fractionPart);
  }

  /**
   * Integer part, truncated toward zero
   */
  wholeUnits(): string {
    return this.integerDigits;
  }

  /**
   * Rounds half to even at two decimal places
   */
  toFixed2(): { whole: string; cents: string } {
    const kept = this.fractionDigits.slice(0, 2).padEnd(2, "0");
    const rest = this.fractionDigits.slice(2);
    let scaled = BigInt(this.integerDigits + kept);

    if (rest.length > 0) {
      const firstDropped = rest[0];
      const tailIsNonZero = /[1-9]/.test(rest.slice(1));
      const roundUp =
        firstDropped > "5" ||
        (firstDropped === "5" && (tailIsNonZero || scaled % 2n === 1n));
      if (roundUp) {
        scaled += 1n;
      }
    }

    return {
      whole: (scaled / 100n).toString(),
      cents: (scaled % 100n).toString().padStart(2, "0"),
    };
  }

  /**
   * Two decimals with thousands separated, e.g. "1 234 567.89"
   */
  formatGrouped(separator: string = " "): string {
    const { whole, cents } = this.toFixed2();
    const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, separator);
    return `${grouped}.${cents}`;
  }

  toString(): string {
    return this.fractionDigits.length > 0
      ? `${this.integerDigits}.${this.fractionDigits}`
      : this.integerDigits;
  }
}
