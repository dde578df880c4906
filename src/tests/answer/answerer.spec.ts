import { describe, expect, it, vi } from "vitest";
import { QuestionAnswerer } from "../../answer/answerer";
import type { SourceAdapter } from "../../data/adapter";
import { SourceRegistry } from "../../data/registry";
import { OrchestrationFault } from "../../errors";
import { parseQuestionAnalysis } from "../../parsers/question-schema";
import { SourceStatisticsTracker } from "../../stats/tracker";
import type { AnswerCycleOutcome, SourceName } from "../../types";

const FANOUT = {
  maxSources: 5,
  maxConcurrency: 5,
  perSourceTimeoutSeconds: 1,
  overallTimeoutSeconds: 2,
  earlyStopThreshold: 2,
  substantialLength: 100
};

function stubAdapter(name: SourceName, text: string | null) {
  const fetch = vi.fn(async (): Promise<string | null> => text);
  const adapter: SourceAdapter = { name, timeoutSeconds: 5, fetch };
  return { adapter, fetch };
}

function setup(texts: Partial<Record<SourceName, string | null>>, contextSize = 10) {
  const stubs = Object.entries(texts).flatMap(([name, text]) => {
    const match = stubNames.find((candidate) => candidate === name);
    return match ? [stubAdapter(match, text ?? null)] : [];
  });
  const registry = new SourceRegistry(stubs.map((stub) => stub.adapter));
  const answerer = new QuestionAnswerer({ registry, fanout: FANOUT, contextSize });
  const fetches = new Map(stubs.map((stub) => [stub.adapter.name, stub.fetch]));
  return { answerer, fetches };
}

const stubNames: SourceName[] = ["wolfram", "google", "duckduckgo", "wikipedia", "arxiv", "dbpedia", "youtube"];

describe("QuestionAnswerer", () => {
  it("answers from the fused results", async () => {
    const { answerer } = setup({ wolfram: "Paris, France", google: "Paris is the capital of France." });

    const answer = await answerer.answerQuestion("Qual a capital da França?", "qual");

    expect(answer?.text).toBe("Paris is the capital of France.");
    expect(answer?.source).toBe("google");
  });

  it("serves a repeated question from the cache", async () => {
    const { answerer, fetches } = setup({ google: "Paris is the capital of France." });

    const first = await answerer.answerQuestion("Qual a capital da França?", "qual");
    const second = await answerer.answerQuestion("qual a capital da franca?", "qual");

    expect(second).toEqual(first);
    expect(fetches.get("google")).toHaveBeenCalledTimes(1);
  });

  it("hands out cached answers that callers cannot alter", async () => {
    const { answerer } = setup({ google: "Paris is the capital of France." });

    const first = await answerer.answerQuestion("Capital of France?", "qual");
    first?.contributingSources.push("wikipedia");
    const second = await answerer.answerQuestion("Capital of France?", "qual");
    second?.contributingSources.push("arxiv");
    const third = await answerer.answerQuestion("Capital of France?", "qual");

    expect(third?.contributingSources).toEqual(["google"]);
  });

  it("does not cache a missing answer", async () => {
    const { answerer, fetches } = setup({ google: null });

    await expect(answerer.answerQuestion("Unanswerable?", "qual")).resolves.toBeNull();
    await expect(answerer.answerQuestion("Unanswerable?", "qual")).resolves.toBeNull();
    expect(fetches.get("google")).toHaveBeenCalledTimes(2);
  });

  it("fans out again after reset", async () => {
    const { answerer, fetches } = setup({ google: "Paris is the capital of France." });

    await answerer.answerQuestion("Capital of France?", "qual");
    answerer.reset();
    await answerer.answerQuestion("Capital of France?", "qual");

    expect(fetches.get("google")).toHaveBeenCalledTimes(2);
    expect(answerer.recentExchanges()).toHaveLength(1);
  });

  it("follows an explicit source priority", async () => {
    const { answerer, fetches } = setup({ google: "Google says Paris is the capital.", wikipedia: "Wikipedia says Paris." });

    await answerer.answerQuestion("Capital of France?", "qual", { sourcePriority: ["wikipedia"] });

    expect(fetches.get("wikipedia")).toHaveBeenCalledTimes(1);
    expect(fetches.get("google")).not.toHaveBeenCalled();
  });

  it("selects sources from the question analysis", async () => {
    const { answerer, fetches } = setup({ wolfram: "Forty two exactly", google: "unused" });

    const answer = await answerer.answerQuestion("What is 6 * 7?", "qual", {
      analysis: parseQuestionAnalysis({ category: "calculation" })
    });

    expect(answer?.source).toBe("wolfram");
    expect(fetches.get("google")).not.toHaveBeenCalled();
  });

  it("notifies outcome listeners and survives a failing one", async () => {
    const { answerer } = setup({ google: "Paris is the capital of France.", wikipedia: null });
    const outcomes: AnswerCycleOutcome[] = [];
    answerer.onOutcome(() => {
      throw new Error("listener broke");
    });
    answerer.onOutcome((outcome) => outcomes.push(outcome));

    const answer = await answerer.answerQuestion("Capital of France?", "qual");

    expect(answer).not.toBeNull();
    expect(outcomes).toHaveLength(1);
    expect(outcomes[0].selectedSources).toEqual(["google", "wikipedia"]);
    expect(outcomes[0].results.map((result) => result.text)).toEqual(["Paris is the capital of France.", null]);
  });

  it("keeps only the most recent exchanges", async () => {
    const { answerer } = setup({ google: "A reply that is long enough." }, 2);

    await answerer.answerQuestion("First question", "geral");
    await answerer.answerQuestion("Second question", "geral");
    await answerer.answerQuestion("Third question", "geral");

    expect(answerer.recentExchanges().map((exchange) => exchange.question)).toEqual(["Second question", "Third question"]);
  });

  it("wraps unexpected failures", async () => {
    const broken: SourceAdapter = {
      name: "google",
      timeoutSeconds: 5,
      fetch: () => {
        throw new Error("synchronous failure");
      }
    };
    const answerer = new QuestionAnswerer({ registry: new SourceRegistry([broken]), fanout: FANOUT });

    await expect(answerer.answerQuestion("Anything?", "qual")).rejects.toBeInstanceOf(OrchestrationFault);
  });

  it("orders the analysed category's sources by recorded statistics", async () => {
    const stubs = (["wikipedia", "duckduckgo", "google", "arxiv"] as const).map((name) => stubAdapter(name, null));
    const tracker = new SourceStatisticsTracker();
    tracker.record({ source: "google", latencySeconds: 1, success: true, quality: 1 });
    tracker.record({ source: "wikipedia", latencySeconds: 1, success: false, quality: 0 });
    const answerer = new QuestionAnswerer({
      registry: new SourceRegistry(stubs.map((stub) => stub.adapter)),
      fanout: FANOUT,
      statistics: () => tracker.snapshot()
    });
    const outcomes: AnswerCycleOutcome[] = [];
    answerer.onOutcome((outcome) => outcomes.push(outcome));

    await answerer.answerQuestion("What is a lever?", "qual", { analysis: parseQuestionAnalysis({ category: "definition" }) });

    expect(outcomes[0].selectedSources).toEqual(["google", "duckduckgo", "wikipedia"]);
  });

  it("keeps the category order while no statistics exist", () => {
    const stubs = (["wikipedia", "duckduckgo", "google"] as const).map((name) => stubAdapter(name, null));
    const tracker = new SourceStatisticsTracker();
    const answerer = new QuestionAnswerer({
      registry: new SourceRegistry(stubs.map((stub) => stub.adapter)),
      fanout: FANOUT,
      statistics: () => tracker.snapshot()
    });

    expect(answerer.chooseSources("What is a lever?", { analysis: parseQuestionAnalysis({ category: "definition" }) })).toEqual([
      "wikipedia",
      "duckduckgo",
      "google"
    ]);
  });

  it("caps the number of selected sources", () => {
    const { answerer } = setup({ wolfram: "a", google: "b", duckduckgo: "c", wikipedia: "d", arxiv: "e", dbpedia: "f", youtube: "g" });
    expect(answerer.chooseSources("Anything?")).toEqual(["wolfram", "google", "duckduckgo", "wikipedia", "arxiv"]);
  });
});
