import { BadRequestError, GeneratorNotConfiguredError, UpstreamError } from "./errors";
import type { ConversationHistory } from "./history";
import type { IntentClassifier, IntentMatch } from "./intent";
import { buildContext, buildPrompt, renderHistory } from "./prompt";
import type { ChatResult, SearchHit, SourceRef, TextGenerator } from "./types";
import type { VectorStore } from "./vector-store";

export const NO_DOCUMENTS_ANSWER =
  "I don't have any documents uploaded yet. Please upload a PDF document first so I can answer your questions about it.";

export interface ChatAgentOptions {
  store: VectorStore;
  generator: TextGenerator;
  classifier: IntentClassifier;
  history: ConversationHistory;
  /** Retrieval width when intent detection is off. */
  defaultTopK?: number;
  /** Past messages rendered into each prompt. */
  historyWindow?: number;
  verbose?: boolean;
}

export interface ChatOptions {
  /** Classify the query and size retrieval by intent (default true). */
  useAgentic?: boolean;
  /** Include recent conversation in the prompt (default true). */
  useHistory?: boolean;
}

/** Citation for a retrieved chunk; relevance is 1 - distance, rounded to 3 decimals. */
export function toSourceRef(hit: SearchHit): SourceRef {
  return {
    fileName: hit.metadata.fileName,
    chunkIndex: hit.metadata.chunkIndex,
    relevanceScore: Math.round((1 - hit.distance) * 1000) / 1000,
  };
}

/**
 * Retrieval-augmented chat: retrieve chunks, build the prompt, generate, and
 * record the turn.
 */
export class ChatAgent {
  private readonly store: VectorStore;
  private readonly generator: TextGenerator;
  private readonly classifier: IntentClassifier;
  private readonly history: ConversationHistory;
  private readonly defaultTopK: number;
  private readonly historyWindow: number;
  private readonly verbose: boolean;

  public constructor(opts: ChatAgentOptions) {
    this.store = opts.store;
    this.generator = opts.generator;
    this.classifier = opts.classifier;
    this.history = opts.history;
    this.defaultTopK = opts.defaultTopK ?? 5;
    this.historyWindow = opts.historyWindow ?? 5;
    this.verbose = !!opts.verbose;
  }

  /**
   * Answer a query against the uploaded documents.
   *
   * @throws {BadRequestError} blank query.
   * @throws {UpstreamError} the generation call failed or is not configured.
   */
  public async chat(query: string, opts: ChatOptions = {}): Promise<ChatResult> {
    const { useAgentic = true, useHistory = true } = opts;
    const q = query.trim();
    if (!q) throw new BadRequestError("Query cannot be empty");

    const match: IntentMatch | undefined = useAgentic ? this.classifier.classify(q) : undefined;
    if (match && this.verbose) {
      console.error(
        `[RAG][verbose] Intent ${match.intent} (top_k=${match.topK}${match.matched ? `, /${match.matched}/` : ""})`,
      );
    }

    if (this.store.count() === 0) {
      return { answer: NO_DOCUMENTS_ANSWER, sources: [], intent: match?.intent };
    }

    const hits = await this.store.search(q, match?.topK ?? this.defaultTopK);
    const prompt = buildPrompt({
      query: q,
      context: buildContext(hits),
      history: useHistory ? renderHistory(this.history.list(), this.historyWindow) : "",
      intent: match ? { intent: match.intent, instruction: match.instruction } : undefined,
    });

    let answer: string;
    try {
      answer = await this.generator.generate(prompt);
    } catch (e) {
      if (e instanceof GeneratorNotConfiguredError) throw new UpstreamError(e.message);
      const message = e instanceof Error ? e.message : String(e);
      console.error(`[LLM] Generation with ${this.generator.getModelName()} failed:`, message);
      throw new UpstreamError(`Error generating response: ${message}`);
    }

    const sources = hits.map(toSourceRef);
    this.history.append({
      query: q,
      answer,
      sources,
      intent: match?.intent,
      timestamp: new Date().toISOString(),
    });
    return { answer, sources, intent: match?.intent };
  }
}
