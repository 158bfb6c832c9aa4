import type { ConversationTurn, Intent, SearchHit } from "./types";

export const NO_CONTEXT = "No relevant context found in the documents.";

/** Render retrieved chunks as numbered, attributed excerpts. */
export function buildContext(hits: SearchHit[]): string {
  if (!hits.length) return NO_CONTEXT;
  return hits
    .map((h, i) => `[Document ${i + 1} - ${h.metadata.fileName}]\n${h.content}\n`)
    .join("\n");
}

/**
 * Flatten turns into alternating USER / ASSISTANT lines and keep the last
 * `window` of them.
 */
export function renderHistory(turns: ConversationTurn[], window: number): string {
  if (window <= 0) return "";
  const lines: string[] = [];
  for (const t of turns) {
    lines.push(`USER: ${t.query}`);
    lines.push(`ASSISTANT: ${t.answer}`);
  }
  return lines.slice(-window).map((l) => `${l}\n`).join("");
}

export interface PromptParts {
  query: string;
  context: string;
  /** Pre-rendered history; see {@link renderHistory}. */
  history?: string;
  intent?: { intent: Intent; instruction: string };
}

export function buildPrompt({ query, context, history = "", intent }: PromptParts): string {
  let prompt = `You are an assistant that answers questions about the user's uploaded PDF documents.
Give accurate, helpful answers grounded in the excerpts below.

**CONTEXT FROM DOCUMENTS:**
${context}

**CONVERSATION HISTORY:**
${history}

**USER QUESTION:**
${query}

**INSTRUCTIONS:**
1. Base the answer on the document excerpts above.
2. If the excerpts only partly answer the question, say what is covered and what is missing.
3. Be concise but complete.
4. When citing a fact, name the document it came from.
5. Keep continuity with the conversation history.
6. If the question is unrelated to the documents, steer the user back to them.

**ANSWER:**`;
  if (intent) {
    prompt += `\n\n**DETECTED INTENT:** ${intent.intent}\n${intent.instruction}`;
  }
  return prompt;
}
