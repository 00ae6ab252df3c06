import { expandFinnishNumber } from "./finnish-numbers";

export type Replacement = string | ((match: string, ...groups: string[]) => string);

export interface NormalizationRule {
  pattern: RegExp;
  replacement: Replacement;
}

/**
 * Everything language specific about text normalisation. Rules run in
 * order on the raw text, then the text is lower-cased, translated character
 * by character and reduced to the accepted alphabet. Word expansions apply
 * last, to whole canonical words, and their output must not contain a key.
 */
export interface NormalizationRecipe {
  rules: NormalizationRule[];
  translations: Record<string, string>;
  // Matches a single character outside the alphabet
  unacceptedChar: RegExp;
  wordExpansions: Record<string, string>;
}

const rule = (pattern: RegExp, replacement: Replacement): NormalizationRule => ({
  pattern,
  replacement,
});

// Case-insensitive: these run before lower-casing
const ABBREVIATIONS: Array<[RegExp, string]> = [
  [/\besim\./gi, "esimerkiksi "],
  [/\bmm\./gi, "muun muassa "],
  [/\bns\./gi, "niin sanottu "],
  [/\bnk\./gi, "niin kutsuttu "],
  [/\bjne\./gi, "ja niin edelleen "],
  [/\byms\./gi, "ynnä muuta sellaista "],
  [/\bym\./gi, "ynnä muuta "],
  [/\bts\./gi, "tai siis "],
  [/\bvt\./gi, "virkaa tekevä "],
  [/\bmilj\./gi, "miljoonaa "],
  [/\bmrd\./gi, "miljardia "],
  [/\bpros\./gi, "prosenttia "],
  [/\bn\.\s+(?=\d)/gi, "noin "],
];

export const finnishRecipe: NormalizationRecipe = {
  rules: [
    rule(/\n/g, " "),
    // Initials
    rule(/(^|\s)([A-ZÅÄÖ])\./g, "$1$2 "),
    // Interjections and shouts in brackets
    rule(/\s*[([].*?[)\]]\s*/g, " "),
    rule(/^[([]/, ""),
    rule(/[([][^)\]]*$/, " "),
    rule(/https?:\S*/g, ""),
    rule(/www\.[a-zA-Z]\S*/g, ""),
    rule(/\S*\.html?/g, ""),
    rule(/\.+/g, "."),
    ...ABBREVIATIONS.map(([pattern, replacement]) => rule(pattern, replacement)),
    rule(/±/g, " plus miinus "),
    rule(/%/g, " prosenttia "),
    rule(/€/g, " euroa "),
    rule(/\$/g, " dollaria "),
    rule(/§/g, " pykälä "),
    rule(/\+/g, " plus "),
    // Digit groups: 1 000 000 -> 1000000
    rule(/(\d)\s+(?=\d{3}(?!\d))/g, "$1"),
    rule(/(\d+)\s*[–—-]\s*(\d+)/g, "$1 viiva $2"),
    rule(/(\d+),(\d+)/g, "$1 pilkku $2"),
    rule(/(\d+)\.(\d+)/g, "$1 piste $2"),
    rule(/(\d+)\/(\d+)/g, "$1 kautta $2"),
    // Letter-digit codes: K18 -> K 18
    rule(/(\p{L})(\d)/gu, "$1 $2"),
    rule(/(\d)(\p{L})/gu, "$1 $2"),
    rule(/\d+/g, (digits) => ` ${expandFinnishNumber(digits)} `),
    // Hyphens and dashes are word boundaries
    rule(/[–—‑-]+/g, " "),
  ],
  translations: {
    à: "a",
    á: "a",
    â: "a",
    ã: "a",
    é: "e",
    è: "e",
    ë: "e",
    ê: "e",
    í: "i",
    ì: "i",
    ï: "i",
    î: "i",
    ó: "o",
    ò: "o",
    õ: "o",
    ô: "o",
    ü: "u",
    ú: "u",
    ù: "u",
    û: "u",
    ý: "y",
    ÿ: "y",
    ç: "c",
    ć: "c",
    č: "c",
    ñ: "nj",
    ø: "ö",
    æ: "ä",
    š: "s",
    ž: "z",
    ß: "ss",
    ı: "i",
  },
  unacceptedChar: /[^a-zåäö ]/g,
  // Abbreviations that are also written without a period
  wordExpansions: {
    klo: "kello",
  },
};
