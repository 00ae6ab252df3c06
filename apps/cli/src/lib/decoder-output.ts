import { z } from "zod";
import type { CandidateSegment, SessionId } from "@plenary-corpus/core";

const centiseconds = z.number().int().nonnegative();

export const decoderOutputSchema = z.object({
  segments: z.array(
    z.object({
      start: centiseconds,
      end: centiseconds,
      hypothesis: z.string(),
      reference: z.string().optional(),
    })
  ),
});

export type DecoderOutput = z.infer<typeof decoderOutputSchema>;

export const toCandidates = (
  session: SessionId,
  output: DecoderOutput
): CandidateSegment[] =>
  output.segments.map((segment) => ({ session, ...segment }));
