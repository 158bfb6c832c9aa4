import type { ConversationTurn } from "./types";

/**
 * Process-lifetime conversation log. Oldest turns are dropped once `maxTurns`
 * is exceeded.
 */
export class ConversationHistory {
  private turns: ConversationTurn[] = [];
  private readonly maxTurns: number;

  public constructor(maxTurns = 100) {
    this.maxTurns = Math.max(1, maxTurns);
  }

  public append(turn: ConversationTurn): void {
    this.turns.push(turn);
    if (this.turns.length > this.maxTurns) {
      this.turns.splice(0, this.turns.length - this.maxTurns);
    }
  }

  /** Snapshot of all turns, oldest first. */
  public list(): ConversationTurn[] {
    return this.turns.slice();
  }

  public size(): number {
    return this.turns.length;
  }

  public clear(): void {
    this.turns = [];
  }
}
