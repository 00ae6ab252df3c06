import { diffArrays } from "diff";
import { WordEdit } from "../types/segment";
import { areWordsSame } from "./words";

/**
 * Word-level diff of a decoder hypothesis against a reference span.
 * Words only in the hypothesis are insertions, words only in the reference
 * are deletions, and a removal directly paired with an addition becomes a
 * run of substitutions.
 * @param hypothesisWords decoder words
 * @param referenceWords transcript words
 * @param compare optional word comparison, exact equality by default
 */
export function diffWords(
  hypothesisWords: string[],
  referenceWords: string[],
  compare: (left: string, right: string) => boolean = areWordsSame
): WordEdit[] {
  const diff = diffArrays(hypothesisWords, referenceWords, {
    comparator: compare,
  });

  const result: WordEdit[] = [];

  let hypIndex = 0;
  let refIndex = 0;
  let i = 0;

  while (i < diff.length) {
    const change = diff[i];
    const count = change.count ?? change.value.length;
    const nextChange = i + 1 < diff.length ? diff[i + 1] : null;
    const nextCount = nextChange
      ? nextChange.count ?? nextChange.value.length
      : 0;

    if (
      nextChange &&
      ((change.removed && nextChange.added) ||
        (change.added && nextChange.removed))
    ) {
      const removedCount = change.removed ? count : nextCount;
      const addedCount = change.added ? count : nextCount;
      const substitutions = Math.min(removedCount, addedCount);

      for (let j = 0; j < substitutions; j++) {
        result.push({
          type: "substitution",
          hypothesis: hypothesisWords[hypIndex + j],
          reference: referenceWords[refIndex + j],
        });
      }
      for (let j = substitutions; j < removedCount; j++) {
        result.push({ type: "insertion", hypothesis: hypothesisWords[hypIndex + j] });
      }
      for (let j = substitutions; j < addedCount; j++) {
        result.push({ type: "deletion", reference: referenceWords[refIndex + j] });
      }

      hypIndex += removedCount;
      refIndex += addedCount;
      i += 2;
    } else if (change.removed) {
      for (let j = 0; j < count; j++) {
        result.push({ type: "insertion", hypothesis: hypothesisWords[hypIndex + j] });
      }
      hypIndex += count;
      i++;
    } else if (change.added) {
      for (let j = 0; j < count; j++) {
        result.push({ type: "deletion", reference: referenceWords[refIndex + j] });
      }
      refIndex += count;
      i++;
    } else {
      // A custom comparator can call two different words equal
      for (let j = 0; j < count; j++) {
        const hypothesis = hypothesisWords[hypIndex + j];
        const reference = referenceWords[refIndex + j];
        result.push({
          type: hypothesis === reference ? "unchanged" : "substitution",
          hypothesis,
          reference,
        });
      }
      hypIndex += count;
      refIndex += count;
      i++;
    }
  }

  return result;
}

export function countEdits(edits: WordEdit[]): number {
  return edits.filter((edit) => edit.type !== "unchanged").length;
}
