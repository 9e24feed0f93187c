import { z } from "zod";

const keywordList = z.array(z.string().trim().min(1).toLowerCase());

export const keywordTiersSchema = z.object({
  highImpact: keywordList,
  contentIndicator: keywordList,
  emotionalTrigger: keywordList,
  callToAction: keywordList
});

const frameDiffSignalSchema = z.object({
  fps: z.number().positive(),
  frameCount: z.number().int().min(0),
  samples: z.array(
    z.object({
      frameIndex: z.number().int().positive(),
      difference: z.number().min(0).max(1)
    })
  )
});

const transcriptSchema = z.object({
  language: z.string().min(2).nullable().optional(),
  segments: z.array(
    z.object({
      start: z.number().min(0),
      end: z.number().min(0),
      text: z.string()
    })
  ),
  words: z.array(
    z.object({
      text: z.string(),
      start: z.number().min(0),
      end: z.number().min(0),
      confidence: z.number().min(0).max(1).optional()
    })
  )
});

export const highlightJobPayloadSchema = z.object({
  runId: z.string().min(1).optional(),
  signal: frameDiffSignalSchema,
  transcript: transcriptSchema,
  options: z
    .object({
      maxHighlights: z.number().int().min(1).max(50).optional(),
      minDuration: z.number().positive().optional(),
      maxDuration: z.number().positive().optional()
    })
    .optional()
});

export type HighlightJobPayload = z.infer<typeof highlightJobPayloadSchema>;

export function describeIssues(error: z.ZodError) {
  return error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`).join("; ");
}
