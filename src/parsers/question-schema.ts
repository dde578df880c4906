import { z } from "zod";

export const TemporalContextSchema = z.enum(["current", "historical", "neutral"]);

export type TemporalContext = z.infer<typeof TemporalContextSchema>;

/** Question-analysis bag; unknown keys are dropped and missing ones defaulted. */
export const QuestionAnalysisSchema = z.object({
  category: z.string().trim().min(1).catch("general"),
  questionType: z.string().trim().min(1).catch("geral"),
  subQuestions: z.array(z.string()).catch([]),
  entities: z.record(z.string(), z.array(z.string())).catch({}),
  temporalContext: TemporalContextSchema.catch("neutral")
});

export type QuestionAnalysis = z.infer<typeof QuestionAnalysisSchema>;

export function parseQuestionAnalysis(input: unknown): QuestionAnalysis {
  const result = QuestionAnalysisSchema.safeParse(typeof input === "object" && input !== null ? input : {});
  if (!result.success) {
    throw new Error(`Failed to parse question analysis: ${JSON.stringify(result.error.format())}`);
  }
  return result.data;
}
