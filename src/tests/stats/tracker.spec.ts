import { describe, expect, it } from "vitest";
import { assessAnswerQuality } from "../../stats/quality";
import { SourceStatisticsTracker } from "../../stats/tracker";

describe("SourceStatisticsTracker", () => {
  it("keeps running means and a success rate", () => {
    const tracker = new SourceStatisticsTracker();
    tracker.record({ source: "google", latencySeconds: 1, success: true, quality: 0.75 });
    tracker.record({ source: "google", latencySeconds: 3, success: false, quality: 0.25 });

    expect(tracker.snapshot().get("google")).toEqual({
      source: "google",
      successRate: 0.5,
      averageLatency: 2,
      qualityScore: 0.5,
      totalUses: 2
    });
  });

  it("hands out snapshots detached from later records", () => {
    const tracker = new SourceStatisticsTracker();
    tracker.record({ source: "wikipedia", latencySeconds: 1, success: true });
    const snapshot = tracker.snapshot();
    tracker.record({ source: "wikipedia", latencySeconds: 1, success: false });

    expect(snapshot.get("wikipedia")?.totalUses).toBe(1);
    expect(Object.isFrozen(snapshot.get("wikipedia"))).toBe(true);
  });

  it("credits contributors of an answer cycle", () => {
    const tracker = new SourceStatisticsTracker();
    const text = "Paris is the capital of France. It is known for the Eiffel Tower.";
    tracker.recordCycle({
      question: "What is the capital of France?",
      category: "qual",
      selectedSources: ["google", "wolfram"],
      results: [
        { source: "google", text, latencySeconds: 0.5 },
        { source: "wolfram", text: null, latencySeconds: 1.5 }
      ],
      answer: { text, contributingSources: ["google"], source: "google", strategy: "factual" },
      elapsedMs: 1500
    });

    const snapshot = tracker.snapshot();
    expect(snapshot.get("google")?.successRate).toBe(1);
    expect(snapshot.get("google")?.qualityScore).toBeCloseTo(0.9667, 4);
    expect(snapshot.get("wolfram")?.successRate).toBe(0);
    expect(snapshot.get("wolfram")?.qualityScore).toBe(0);
  });

  it("leaves sources the fan-out stopped waiting for untouched", () => {
    const tracker = new SourceStatisticsTracker();
    tracker.record({ source: "youtube", latencySeconds: 8, success: true });
    tracker.recordCycle({
      question: "How do plants grow?",
      category: "como",
      selectedSources: ["youtube"],
      results: [{ source: "youtube", text: null, latencySeconds: null }],
      answer: null,
      elapsedMs: 2000
    });

    expect(tracker.snapshot().get("youtube")).toEqual({
      source: "youtube",
      successRate: 1,
      averageLatency: 8,
      qualityScore: 0,
      totalUses: 1
    });
  });
});

describe("assessAnswerQuality", () => {
  it("rewards length, structure and overlap", () => {
    expect(
      assessAnswerQuality("What is the capital of France?", "Paris is the capital of France. It is known for the Eiffel Tower.")
    ).toBeCloseTo(0.9667, 4);
  });

  it("penalizes apologies", () => {
    expect(assessAnswerQuality("What is dark matter?", "Sorry, I don't know.")).toBeCloseTo(0.1, 10);
  });
});
