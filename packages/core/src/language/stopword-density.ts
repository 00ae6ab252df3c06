export interface StopwordDensity {
  hits: number;
  tokens: number;
  density: number;
}

/** Share of whitespace tokens that appear in the stoplist. */
export function measureStopwordDensity(
  text: string,
  stoplist: ReadonlySet<string>
): StopwordDensity {
  const tokens = text
    .toLowerCase()
    .split(/[^\p{L}]+/u)
    .filter(Boolean);
  const hits = tokens.filter((token) => stoplist.has(token)).length;
  return {
    hits,
    tokens: tokens.length,
    density: tokens.length ? hits / tokens.length : 0,
  };
}
