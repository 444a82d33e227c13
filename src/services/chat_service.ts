import type { VectorStore } from "../repositories/vector_store.js";
import type {
  ChatResponse,
  ChatSource,
  ScoredChunk,
  TemplateChatResponse,
} from "../types/index.js";
import { NO_CONTEXT_ANSWER, NO_TEMPLATE_CONTEXT_ANSWER } from "../utils/constants.js";
import { UpstreamError } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import type { EmbeddingProvider } from "./embeddings.js";
import type { ChatModel } from "./llm.js";
import { buildAnswerMessages, buildExtractionMessages, parseJsonObject } from "./prompt_builder.js";
import type { TemplateService } from "./template_service.js";

export interface ChatQuery {
  query: string;
  userId: string;
  contextWindow: number;
  documentId?: string;
}

export interface TemplateChatQuery extends ChatQuery {
  templateId: string;
}

export interface ChatServiceDeps {
  vectorStore: VectorStore;
  embeddings: EmbeddingProvider;
  chatModel: ChatModel;
  templates: TemplateService;
  log: Logger;
}

const toSource = (chunk: ScoredChunk): ChatSource => ({
  content: chunk.content,
  document_id: chunk.documentId,
  similarity: chunk.similarity,
  metadata: chunk.metadata,
});

export class ChatService {
  constructor(
    private readonly deps: ChatServiceDeps,
    private readonly similarityThreshold: number
  ) {}

  async query(request: ChatQuery): Promise<ChatResponse> {
    const chunks = await this.retrieve(request);
    if (chunks.length === 0) {
      return { answer: NO_CONTEXT_ANSWER, sources: [], template_used: null };
    }

    const answer = await this.deps.chatModel.complete(buildAnswerMessages(request.query, chunks));
    return { answer, sources: chunks.map(toSource), template_used: null };
  }

  /**
   * Asks the model to pull the template's variables out of the retrieved
   * context, then renders the template with whatever it found.
   */
  async generateFromTemplate(request: TemplateChatQuery): Promise<TemplateChatResponse> {
    const template = await this.deps.templates.get(request.templateId, request.userId);

    const chunks = await this.retrieve(request);
    if (chunks.length === 0) {
      return {
        answer: NO_TEMPLATE_CONTEXT_ANSWER,
        sources: [],
        template_used: template.id,
        output_file: null,
        download_url: null,
        extracted: null,
      };
    }

    const reply = await this.deps.chatModel.complete(
      buildExtractionMessages(request.query, chunks, Object.keys(template.variables))
    );
    const extracted = parseJsonObject(reply);

    const { outputFile, downloadUrl } = await this.deps.templates.process(
      template.id,
      request.userId,
      extracted,
      { strict: false }
    );

    this.deps.log.info(
      { templateId: template.id, userId: request.userId, fields: Object.keys(extracted).length },
      "Template generated from chat"
    );

    return {
      answer:
        `I've processed your request and generated a document using the template. ` +
        `You can download it at: ${downloadUrl}\n\n` +
        `The following information was extracted and used:\n${JSON.stringify(extracted, null, 2)}`,
      sources: chunks.map(toSource),
      template_used: template.id,
      output_file: outputFile,
      download_url: downloadUrl,
      extracted,
    };
  }

  private async retrieve(request: ChatQuery): Promise<ScoredChunk[]> {
    const [embedding] = await this.deps.embeddings.embed([request.query]);
    if (!embedding) throw new UpstreamError("Embedding request returned no vector");

    return this.deps.vectorStore.searchSimilar({
      embedding,
      userId: request.userId,
      limit: request.contextWindow,
      similarityThreshold: this.similarityThreshold,
      documentId: request.documentId,
    });
  }
}
