const ONES = [
  "nolla",
  "yksi",
  "kaksi",
  "kolme",
  "neljä",
  "viisi",
  "kuusi",
  "seitsemän",
  "kahdeksan",
  "yhdeksän",
];

const MAX_EXPANDED = 999_999_999_999;

const belowHundred = (n: number): string => {
  if (n < 10) return ONES[n];
  if (n === 10) return "kymmenen";
  if (n < 20) return `${ONES[n - 10]}toista`;
  const tens = Math.floor(n / 10);
  const rest = n % 10;
  return `${ONES[tens]}kymmentä${rest ? ONES[rest] : ""}`;
};

const belowThousand = (n: number): string => {
  const hundreds = Math.floor(n / 100);
  const rest = n % 100;
  const head =
    hundreds === 0 ? "" : hundreds === 1 ? "sata" : `${ONES[hundreds]}sataa`;
  return `${head}${rest ? belowHundred(rest) : ""}`;
};

const belowMillion = (n: number): string => {
  const thousands = Math.floor(n / 1000);
  const rest = n % 1000;
  const head =
    thousands === 0
      ? ""
      : thousands === 1
        ? "tuhat"
        : `${belowThousand(thousands)}tuhatta`;
  return `${head}${rest ? belowThousand(rest) : ""}`;
};

const scaled = (count: number, singular: string, partitive: string) =>
  count === 1 ? singular : `${belowThousand(count)} ${partitive}`;

/**
 * Spell out a digit string as Finnish cardinal words in the nominative.
 * Numbers with a leading zero (phone numbers, codes) and numbers beyond the
 * supported range are read digit by digit.
 */
export function expandFinnishNumber(digits: string): string {
  if (!/^\d+$/.test(digits)) {
    throw new Error(`Not a digit string: "${digits}"`);
  }

  const value = Number(digits);
  if ((digits.length > 1 && digits.startsWith("0")) || value > MAX_EXPANDED) {
    return [...digits].map((digit) => ONES[Number(digit)]).join(" ");
  }
  if (value === 0) return ONES[0];

  const billions = Math.floor(value / 1_000_000_000);
  const millions = Math.floor((value % 1_000_000_000) / 1_000_000);
  const rest = value % 1_000_000;

  const parts: string[] = [];
  if (billions) parts.push(scaled(billions, "miljardi", "miljardia"));
  if (millions) parts.push(scaled(millions, "miljoona", "miljoonaa"));
  if (rest) parts.push(belowMillion(rest));
  return parts.join(" ");
}
