import { describe, expect, it } from "vitest";
import { IntentClassifier } from "../src/intent";

describe("IntentClassifier", () => {
  const classifier = new IntentClassifier(5);

  it("widens retrieval for summaries", () => {
    const m = classifier.classify("Can you summarize the annual report?");
    expect(m.intent).toBe("SUMMARIZATION");
    expect(m.topK).toBe(10);
    expect(m.matched).toBeDefined();
    expect(classifier.classify("Give me the key points").intent).toBe("SUMMARIZATION");
  });

  it("uses width 8 for comparisons", () => {
    const m = classifier.classify("Compare the Q1 and Q2 revenue figures");
    expect(m.intent).toBe("COMPARISON");
    expect(m.topK).toBe(8);
    expect(classifier.classify("What's the difference between plan A and plan B?").intent).toBe(
      "COMPARISON",
    );
    expect(classifier.classify("Plan A vs. plan B").intent).toBe("COMPARISON");
  });

  it("falls back to factual questions with the default width", () => {
    const m = classifier.classify("What is the warranty period?");
    expect(m).toEqual({
      intent: "FACTUAL_QUESTION",
      topK: 5,
      instruction: expect.any(String),
    });
    expect(new IntentClassifier(7).classify("Who signed the contract?").topK).toBe(7);
  });

  it("detects requests to clarify an earlier answer", () => {
    expect(classifier.classify("What do you mean by that?").intent).toBe("CLARIFICATION");
    // clarification is checked before summarization
    expect(classifier.classify("Can you clarify the summary?").intent).toBe("CLARIFICATION");
  });

  it("only treats short small talk as general chat", () => {
    expect(classifier.classify("hello!").intent).toBe("GENERAL_CHAT");
    expect(classifier.classify("thanks a lot").intent).toBe("GENERAL_CHAT");
    expect(classifier.classify("Who are you?").intent).toBe("GENERAL_CHAT");
    expect(classifier.classify("hello, what does chapter 2 say about pricing?").intent).toBe(
      "FACTUAL_QUESTION",
    );
  });
});
