export * from "./types/session";
export * from "./types/language";
export * from "./types/speaker";
export * from "./types/transcript";
export * from "./types/segment";
export * from "./types/corpus";

export * from "./utils/words";
export * from "./utils/diff-words";
export * from "./utils/session-id";

export * from "./transcript/markup";
export * from "./transcript/transcript-parser";
export * from "./transcript/finnish-numbers";
export * from "./transcript/recipe";
export * from "./transcript/text-normalizer";
export * from "./transcript/vocabulary";
export * from "./transcript/prepare-transcript";

export * from "./speakers/speaker-names";
export * from "./speakers/speaker-resolver";

export * from "./language/language-labels";
export * from "./language/stopword-density";
export * from "./language/stopword-classifier";

export * from "./alignment/span-search";
export * from "./alignment/reconciler";
export * from "./alignment/segment-labeler";
export * from "./alignment/retry-list";

export * from "./corpus/tables";
export * from "./corpus/corpus-assembler";
export * from "./corpus/language-filter";
