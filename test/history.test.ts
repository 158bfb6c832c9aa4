import { describe, expect, it } from "vitest";
import { ConversationHistory } from "../src/history";
import type { ConversationTurn } from "../src/types";

function turn(n: number): ConversationTurn {
  return { query: `q${n}`, answer: `a${n}`, sources: [], timestamp: "t" };
}

describe("ConversationHistory", () => {
  it("drops the oldest turns beyond the cap", () => {
    const history = new ConversationHistory(3);
    for (let i = 1; i <= 5; i++) history.append(turn(i));
    expect(history.size()).toBe(3);
    expect(history.list().map((t) => t.query)).toEqual(["q3", "q4", "q5"]);
  });

  it("hands out copies of its turn list", () => {
    const history = new ConversationHistory();
    history.append(turn(1));
    history.list().pop();
    expect(history.size()).toBe(1);
    history.clear();
    expect(history.list()).toEqual([]);
  });
});
