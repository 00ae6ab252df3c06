import { describe, it, expect } from "vitest";
import { expandFinnishNumber } from "./finnish-numbers";

describe("expandFinnishNumber", () => {
  it.each([
    ["0", "nolla"],
    ["7", "seitsemän"],
    ["14", "neljätoista"],
    ["21", "kaksikymmentäyksi"],
    ["100", "sata"],
    ["1001", "tuhatyksi"],
    ["1500", "tuhatviisisataa"],
    ["2015", "kaksituhattaviisitoista"],
    ["3000000", "kolme miljoonaa"],
    ["1000001", "miljoona yksi"],
  ])("should spell %s as %s", (digits, expected) => {
    expect(expandFinnishNumber(digits)).toBe(expected);
  });

  it("should read numbers with a leading zero digit by digit", () => {
    expect(expandFinnishNumber("007")).toBe("nolla nolla seitsemän");
  });

  it("should reject anything but digits", () => {
    expect(() => expandFinnishNumber("12a")).toThrow('Not a digit string: "12a"');
  });
});
