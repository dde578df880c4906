import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { analyzeQuestion } from "./analysis/analyzer";
import type { QuestionAnswerer } from "./answer/answerer";
import { logAnswer } from "./db";
import { OrchestrationFault } from "./errors";
import { describeError, logger } from "./logger";
import type { AdaptiveSourceRanker } from "./selection/adaptive";
import { selectQueries, selectSources } from "./selection/policy";
import { assessAnswerQuality } from "./stats/quality";
import { truncateAtSentence } from "./text/normalizer";
import type { SourceStatisticsTracker } from "./stats/tracker";
import { SOURCE_NAMES } from "./types";

const log = logger.child({ component: "routes" });

const MAX_ANSWER_CHARS = 500;

export const FALLBACK_ANSWER = "Sorry, I could not find a reliable answer to that question right now.";

const AnswerBodySchema = z.object({
  question: z.string().trim().min(1).max(500),
  category: z.string().trim().min(1).optional(),
  sources: z.array(z.enum(SOURCE_NAMES)).optional()
});

const SelectBodySchema = z.object({
  question: z.string().trim().min(1).max(500)
});

export interface RouteDependencies {
  answerer: QuestionAnswerer;
  tracker: SourceStatisticsTracker;
  ranker: AdaptiveSourceRanker;
  /** Defaults to the PostgreSQL answer log. */
  persist?: typeof logAnswer;
}

export function createRouter({ answerer, tracker, ranker, persist = logAnswer }: RouteDependencies): Router {
  const router = Router();

  router.post("/answer", async (req: Request, res: Response, next: NextFunction) => {
    const body = AnswerBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      return res.status(400).json({ message: "Request body must include a question string of at most 500 characters." });
    }
    const { question, sources } = body.data;
    if (!/[\p{L}\p{N}]/u.test(question)) {
      return res.status(400).json({ message: "Question must contain letters or digits." });
    }

    try {
      const startedAt = Date.now();
      const analysis = analyzeQuestion(question);
      const category = body.data.category ?? analysis.questionType;
      const answer = await answerer.answerQuestion(question, category, { sourcePriority: sources, analysis });

      const text = answer ? truncateAtSentence(answer.text, MAX_ANSWER_CHARS) : FALLBACK_ANSWER;
      const source = answer?.source ?? "fallback";
      const fallback = answer === null;

      try {
        await persist({
          question,
          category,
          answer: text,
          source,
          fallback,
          quality: answer ? assessAnswerQuality(question, answer.text) : 0,
          elapsedMs: Date.now() - startedAt
        });
      } catch (error) {
        log.warn("Failed to persist answer log", { error: describeError(error) });
      }

      return res.json({ answer: text, source, strategy: answer?.strategy ?? null, fallback });
    } catch (error) {
      if (error instanceof OrchestrationFault) {
        return res.status(500).json({ message: "Unexpected server error" });
      }
      return next(error);
    }
  });

  router.post("/sources/select", (req: Request, res: Response) => {
    const body = SelectBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      return res.status(400).json({ message: "Request body must include a question string." });
    }
    const { question } = body.data;
    const analysis = analyzeQuestion(question);
    return res.json({
      analysis,
      sources: selectSources(analysis),
      queries: selectQueries(question, analysis),
      ranking: ranker.rank(question, SOURCE_NAMES, tracker.snapshot())
    });
  });

  router.get("/sources/stats", (_req: Request, res: Response) => {
    res.json({ sources: Array.from(tracker.snapshot().values()) });
  });

  return router;
}
