import { describe, expect, it } from "vitest";
import { MAX_QUERIES, selectQueries, selectSources } from "../../selection/policy";
import { SOURCE_NAMES } from "../../types";

describe("selectSources", () => {
  it("maps specialized categories to their sources", () => {
    expect(selectSources({ category: "calculation", temporalContext: "neutral" })).toEqual(["wolfram"]);
    expect(selectSources({ category: "scientific", temporalContext: "neutral" })).toEqual(["arxiv", "wikipedia", "google"]);
  });

  it("accepts Portuguese category names", () => {
    expect(selectSources({ category: "definição", temporalContext: "neutral" })).toEqual(["wikipedia", "duckduckgo", "google"]);
    expect(selectSources({ category: "processo", temporalContext: "neutral" })).toEqual(["youtube", "wikipedia", "google"]);
  });

  it("falls back on temporal context", () => {
    expect(selectSources({ category: "general", temporalContext: "current" })).toEqual(["google", "duckduckgo", "wikipedia"]);
    expect(selectSources({ category: "general", temporalContext: "historical" })).toEqual(["wikipedia", "google"]);
  });

  it("asks every source when nothing is recognized", () => {
    expect(selectSources({ category: "general", temporalContext: "neutral" })).toEqual([...SOURCE_NAMES]);
  });

  it("only returns available sources", () => {
    expect(selectSources({ category: "scientific", temporalContext: "neutral" }, ["google", "wikipedia"])).toEqual([
      "wikipedia",
      "google"
    ]);
  });
});

describe("selectQueries", () => {
  it("adds definition variants for the first entity", () => {
    expect(
      selectQueries("What is entropy?", { category: "definition", entities: { ORG: ["Acme"], MISC: ["entropy"] }, subQuestions: [] })
    ).toEqual(["What is entropy?", "what is entropy", "entropy definition", "entropy meaning"]);
  });

  it("splits comparisons into both halves", () => {
    expect(selectQueries("Compare Python and Java", { category: "comparison", entities: {}, subQuestions: [] })).toEqual([
      "Compare Python and Java",
      "Compare Python",
      "Java"
    ]);
    expect(selectQueries("Diferença entre gato e cachorro", { category: "comparação", entities: {}, subQuestions: [] })).toEqual([
      "Diferença entre gato e cachorro",
      "Diferença entre gato",
      "cachorro"
    ]);
  });

  it("deduplicates and caps the list", () => {
    const queries = selectQueries("Who won and why?", {
      category: "general",
      entities: {},
      subQuestions: ["Who won", "why?", "Who won", "a", "b", "c", "d"]
    });

    expect(queries).toEqual(["Who won and why?", "Who won", "why?", "a", "b"]);
    expect(queries).toHaveLength(MAX_QUERIES);
  });

  it("keeps a lone sub-question out", () => {
    expect(selectQueries("Why?", { category: "general", entities: {}, subQuestions: ["Why?"] })).toEqual(["Why?"]);
  });
});
