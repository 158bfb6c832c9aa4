import type { Intent } from "./types";

/** Static description of one intent category. */
export interface IntentProfile {
  intent: Intent;
  patterns: RegExp[];
  /** Retrieval width; undefined means the configured default. */
  topK?: number;
  /** Style guidance appended to the prompt. */
  instruction: string;
}

export interface IntentMatch {
  intent: Intent;
  topK: number;
  instruction: string;
  /** Source of the pattern that fired; absent for the fallback. */
  matched?: string;
}

// Checked top to bottom; the first profile with a matching pattern wins.
export const INTENT_PROFILES: readonly IntentProfile[] = [
  {
    intent: "CLARIFICATION",
    patterns: [
      /\bwhat do you mean\b/i,
      /\b(clarify|elaborate|rephrase)\b/i,
      /\bexplain (that|this|it) (again|further|more)\b/i,
      /\b(you (just )?said|your (previous|last|earlier) (answer|response|reply))\b/i,
      /\bi (don'?t|do not) understand\b/i,
      /\bin (simpler|plain(er)?) (terms|words|english)\b/i,
    ],
    instruction:
      "The user wants clarification of an earlier answer. Revisit the conversation history, restate the relevant point more plainly and add supporting detail from the documents.",
  },
  {
    intent: "SUMMARIZATION",
    patterns: [
      /\bsummar(y|ies|ise|ize|ising|izing)\b/i,
      /\b(overview|recap|gist|synopsis|outline)\b/i,
      /\b(key|main) (points|ideas|takeaways|findings|themes)\b/i,
      /\btl;?dr\b/i,
      /\bwhat is (this|the) (document|paper|pdf|file|report) about\b/i,
      /\bin (brief|short|a nutshell)\b/i,
    ],
    topK: 10,
    instruction:
      "The user wants a summary. Cover the main points across all provided excerpts in a structured, concise form.",
  },
  {
    intent: "COMPARISON",
    patterns: [
      /\bcompar(e|es|ed|ing|ison|isons)\b/i,
      /\bdiffer(s|ence|ences)?\b/i,
      /\b(versus|vs\.?)\b/i,
      /\b(contrast|similarit(y|ies)|distinguish)\b/i,
      /\b(which|what) is (better|worse|faster|cheaper|larger|smaller)\b/i,
      /\bpros and cons\b/i,
    ],
    topK: 8,
    instruction:
      "The user wants a comparison. Lay out the similarities and differences side by side, citing which document each point comes from.",
  },
  {
    intent: "GENERAL_CHAT",
    patterns: [
      /^\s*(hi|hello|hey|hiya|greetings|good (morning|afternoon|evening))\b[\s!.,]*(there)?[\s!.,]*$/i,
      /^\s*(thanks|thank you|thx|cheers|ok(ay)?|cool|great|bye|goodbye)\b[\s\w!.,]{0,20}$/i,
      /^\s*(how are you|who are you|what can you do|what are you)\b[\s?!.]*$/i,
    ],
    instruction:
      "The user is making conversation. Reply briefly and politely, and invite a question about the uploaded documents.",
  },
];

const FACTUAL: Omit<IntentProfile, "patterns"> = {
  intent: "FACTUAL_QUESTION",
  instruction:
    "The user wants specific information. Answer precisely from the documents and mention which document supports the answer.",
};

/**
 * Rule-based query intent detection: each query is matched against the
 * keyword patterns of {@link INTENT_PROFILES}; unmatched queries are factual
 * questions.
 */
export class IntentClassifier {
  private readonly defaultTopK: number;
  private readonly profiles: readonly IntentProfile[];

  public constructor(defaultTopK = 5, profiles: readonly IntentProfile[] = INTENT_PROFILES) {
    this.defaultTopK = defaultTopK;
    this.profiles = profiles;
  }

  public classify(query: string): IntentMatch {
    for (const profile of this.profiles) {
      const hit = profile.patterns.find((p) => p.test(query));
      if (hit) {
        return {
          intent: profile.intent,
          topK: profile.topK ?? this.defaultTopK,
          instruction: profile.instruction,
          matched: hit.source,
        };
      }
    }
    return {
      intent: FACTUAL.intent,
      topK: FACTUAL.topK ?? this.defaultTopK,
      instruction: FACTUAL.instruction,
    };
  }
}
