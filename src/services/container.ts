import type { AppConfig } from "../config/env.js";
import { MongoDocumentRepository, type DocumentRepository } from "../repositories/document_repository.js";
import { MongoTemplateRepository } from "../repositories/template_repository.js";
import { MongoUserRepository, type UserRepository } from "../repositories/user_repository.js";
import { MongoVectorStore, type VectorStore } from "../repositories/vector_store.js";
import type { Logger } from "../utils/logger.js";
import { noopDocumentEvents, type DocumentEvents } from "../utils/socket_server.js";
import { ChatService } from "./chat_service.js";
import { DocumentProcessor } from "./document_processor.js";
import { OpenAIEmbeddingProvider } from "./embeddings.js";
import { OpenAIChatModel } from "./llm.js";
import { OpenAICallPolicy, createOpenAIClient } from "./openai_client.js";
import { S3Storage, type ObjectStorage } from "./storage.js";
import { TemplateService } from "./template_service.js";

/** Everything the HTTP layer talks to. Tests build this from in-memory fakes. */
export interface AppServices {
  users: UserRepository;
  documents: DocumentRepository;
  vectorStore: VectorStore;
  storage: ObjectStorage;
  processor: DocumentProcessor;
  templates: TemplateService;
  chat: ChatService;
}

export function createServices(
  config: AppConfig,
  log: Logger,
  events: DocumentEvents = noopDocumentEvents
): AppServices {
  const client = createOpenAIClient(config.openai);
  const policy = OpenAICallPolicy.fromConfig(config.openai, log.child({ component: "openai" }));
  const embeddings = new OpenAIEmbeddingProvider(
    client,
    config.openai.embeddingModel,
    policy,
    config.openai.embeddingDimension
  );
  const chatModel = new OpenAIChatModel(client, config.openai.chatModel, policy);

  const documents = new MongoDocumentRepository();
  const vectorStore = new MongoVectorStore(config.mongo.vectorIndexName);
  const storage = new S3Storage(config.storage);
  const templates = new TemplateService(new MongoTemplateRepository(), storage, log);

  const processor = new DocumentProcessor(
    { documents, vectorStore, embeddings, events, log: log.child({ component: "processor" }) },
    {
      chunkSize: config.processing.chunkSize,
      chunkOverlap: config.processing.chunkOverlap,
      maxFileSize: config.processing.maxFileSize,
      embeddingBatchSize: config.openai.embeddingBatchSize,
    }
  );

  const chat = new ChatService(
    { vectorStore, embeddings, chatModel, templates, log },
    config.retrieval.similarityThreshold
  );

  return {
    users: new MongoUserRepository(),
    documents,
    vectorStore,
    storage,
    processor,
    templates,
    chat,
  };
}
