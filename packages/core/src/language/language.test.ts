import { describe, it, expect } from "vitest";
import { combineLabels, labelFromCode, labelFromGuess } from "./language-labels";
import { StopwordLanguageClassifier } from "./stopword-classifier";
import { measureStopwordDensity } from "./stopword-density";

const languages = { majority: "fi", minority: "sv" };
const stoplist = new Set(["jag", "att", "det", "är", "och"]);

describe("language labels", () => {
  it("should map declared codes", () => {
    expect(labelFromCode("fi", languages)).toBe("majority");
    expect(labelFromCode("sv", languages)).toBe("minority");
    expect(labelFromCode("sv.p", languages)).toBe("minority");
    expect(labelFromCode("fi+sv", languages)).toBe("mixed");
    expect(labelFromCode("en", languages)).toBe("minority");
    expect(labelFromCode("", languages)).toBe("majority");
  });

  it("should read unknown classifier labels as the majority language", () => {
    expect(labelFromGuess("en", languages)).toBe("majority");
    expect(labelFromGuess("sv", languages)).toBe("minority");
    expect(labelFromGuess("fi,sv", languages)).toBe("mixed");
  });

  it("should combine span labels", () => {
    expect(combineLabels([])).toBe("majority");
    expect(combineLabels(["minority", "minority"])).toBe("minority");
    expect(combineLabels(["majority", "minority"])).toBe("mixed");
    expect(combineLabels(["majority", "mixed"])).toBe("mixed");
  });
});

describe("measureStopwordDensity", () => {
  it("should count stoplist tokens", () => {
    const result = measureStopwordDensity("Jag tror att det är bra", stoplist);

    expect(result.hits).toBe(4);
    expect(result.tokens).toBe(6);
    expect(result.density).toBeCloseTo(4 / 6);
  });

  it("should report zero density for empty text", () => {
    expect(measureStopwordDensity("", stoplist)).toEqual({ hits: 0, tokens: 0, density: 0 });
  });
});

describe("StopwordLanguageClassifier", () => {
  const classifier = new StopwordLanguageClassifier({ languages, stoplist });

  it("should detect the minority language", async () => {
    await expect(classifier.classify("Jag tror att det är bra")).resolves.toEqual({
      label: "sv",
      confidence: 1,
    });
  });

  it("should detect mixed text", async () => {
    const guess = await classifier.classify(
      "Minä sanoin että och sitten jatkoin puhetta tässä asiassa"
    );
    expect(guess).toEqual({ label: "fi+sv", confidence: 0.5 });
  });

  it("should default to the majority language", async () => {
    const guess = await classifier.classify("Minä olen samaa mieltä");
    expect(guess).toEqual({ label: "fi", confidence: 1 });
  });
});
