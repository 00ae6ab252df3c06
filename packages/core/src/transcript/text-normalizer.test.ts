import { describe, it, expect } from "vitest";
import { NormalizationRecipe } from "./recipe";
import { normalizeText, TextNormalizer } from "./text-normalizer";

describe("normalizeText", () => {
  it("should expand numbers, symbols and decimals and drop interjections", () => {
    expect(normalizeText("Budjetti kasvaa 3,5 % (Välihuuto) vuonna 2015.")).toBe(
      "budjetti kasvaa kolme pilkku viisi prosenttia vuonna kaksituhattaviisitoista"
    );
  });

  it("should expand abbreviations", () => {
    expect(normalizeText("Kokous alkoi klo 14.")).toBe("kokous alkoi kello neljätoista");
  });

  it("should separate initials", () => {
    expect(normalizeText("J. K. Paasikivi puhui.")).toBe("j k paasikivi puhui");
  });

  it("should leave canonical text unchanged", () => {
    const canonical = normalizeText("Budjetti kasvaa 3,5 % vuonna 2015.");
    expect(normalizeText(canonical)).toBe(canonical);
  });

  it.each(["Klo 14 alkaa istunto", "KLO. 9 Esim. kokous", "kokous kló 14"])(
    "should reach canonical form in one pass for %s",
    (raw) => {
      const canonical = normalizeText(raw);
      expect(normalizeText(canonical)).toBe(canonical);
    }
  );

  it("should expand abbreviations regardless of case", () => {
    expect(normalizeText("Klo 14 alkaa istunto")).toBe("kello neljätoista alkaa istunto");
    expect(normalizeText("Esim. tänään")).toBe("esimerkiksi tänään");
  });

  it("should apply a custom recipe", () => {
    const recipe: NormalizationRecipe = {
      rules: [],
      translations: {},
      unacceptedChar: /[^a-z ]/g,
      wordExpansions: { hi: "hello" },
    };
    expect(normalizeText("Hi, World!", recipe)).toBe("hello world");
  });
});

describe("TextNormalizer", () => {
  it("should collect vocabulary only when asked", () => {
    const normalizer = new TextNormalizer();

    expect(normalizer.normalize("Hyvä hyvä puhemies", { collectVocabulary: true })).toBe(
      "hyvä hyvä puhemies"
    );
    normalizer.normalize("Jag tror det");

    expect(normalizer.vocabulary.toSortedArray()).toEqual(["hyvä", "puhemies"]);
  });
});
