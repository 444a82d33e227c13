import { randomUUID } from "crypto";
import type { DocumentRepository } from "../repositories/document_repository.js";
import type { VectorStore } from "../repositories/vector_store.js";
import type { ChunkRecord, DocumentRecord } from "../types/index.js";
import type { DocumentEvents } from "../utils/socket_server.js";
import type { Logger } from "../utils/logger.js";
import {
  FileSizeError,
  InvalidFileError,
  describeProcessingFailure,
} from "../utils/errors.js";
import { chunkText, type ChunkOptions, type Tokenizer } from "../utils/text_chunker.js";
import { embedInBatches, type EmbeddingProvider } from "./embeddings.js";
import { extractText } from "./text_extraction.js";

export interface DocumentProcessorOptions extends ChunkOptions {
  maxFileSize: number;
  embeddingBatchSize: number;
  tokenizer?: Tokenizer;
}

export interface DocumentProcessorDeps {
  documents: DocumentRepository;
  vectorStore: VectorStore;
  embeddings: EmbeddingProvider;
  events: DocumentEvents;
  log: Logger;
}

/**
 * Background ingestion: extract → chunk → embed → store, moving the document
 * through pending → processing → completed | error.
 */
export class DocumentProcessor {
  private readonly inFlight = new Set<Promise<DocumentRecord | null>>();

  constructor(
    private readonly deps: DocumentProcessorDeps,
    private readonly options: DocumentProcessorOptions
  ) {}

  /**
   * Starts processing without waiting for it. Failures end up on the document
   * record, so the returned promise never rejects.
   */
  enqueue(document: DocumentRecord, buffer: Buffer): Promise<DocumentRecord | null> {
    const job = this.process(document, buffer).finally(() => {
      this.inFlight.delete(job);
    });
    this.inFlight.add(job);
    return job;
  }

  get pending(): number {
    return this.inFlight.size;
  }

  /** Resolves once every job enqueued so far (and any started meanwhile) has settled. */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  async process(document: DocumentRecord, buffer: Buffer): Promise<DocumentRecord | null> {
    const { documents, vectorStore, events } = this.deps;
    const log = this.deps.log.child({ docId: document.id, userId: document.userId });

    try {
      if (buffer.length > this.options.maxFileSize) {
        throw new FileSizeError(
          `File size (${buffer.length} bytes) exceeds maximum allowed size (${this.options.maxFileSize} bytes)`
        );
      }

      const started = await documents.updateStatus(document.id, "processing");
      if (!started) {
        log.info("Document deleted before processing started");
        return null;
      }

      const extracted = await extractText(buffer, document.filename);
      if (!extracted.text.trim()) {
        throw new InvalidFileError("no extractable text");
      }

      const pieces = chunkText(
        extracted.text,
        { chunkSize: this.options.chunkSize, chunkOverlap: this.options.chunkOverlap },
        this.options.tokenizer
      );
      if (pieces.length === 0) {
        throw new InvalidFileError("no extractable text");
      }

      const embeddings = await embedInBatches(
        this.deps.embeddings,
        pieces.map((piece) => piece.content),
        this.options.embeddingBatchSize
      );

      const createdAt = new Date();
      const chunks: ChunkRecord[] = pieces.map((piece, i) => ({
        id: randomUUID(),
        documentId: document.id,
        userId: document.userId,
        content: piece.content,
        embedding: embeddings[i],
        metadata: {
          chunk_index: piece.index,
          token_count: piece.tokenCount,
          start_token: piece.startToken,
          filename: document.filename,
          source: extracted.source,
          ...(extracted.pageCount !== undefined ? { page_count: extracted.pageCount } : {}),
        },
        createdAt,
      }));

      await vectorStore.insertChunks(chunks);

      const completed = await documents.updateStatus(document.id, "completed", {
        errorMessage: null,
        metadata: {
          chunk_count: chunks.length,
          processed_at: createdAt.toISOString(),
          file_size: buffer.length,
          ...(extracted.pageCount !== undefined ? { page_count: extracted.pageCount } : {}),
          ...(extracted.pdfVersion ? { pdf_version: extracted.pdfVersion } : {}),
        },
      });

      if (!completed) {
        // deleted while processing: its chunks must not stay searchable
        await vectorStore.deleteByDocument(document.id);
        log.info({ chunks: chunks.length }, "Document deleted during processing, chunks discarded");
        return null;
      }

      log.info({ chunks: chunks.length }, "Document processed");
      events.documentReady(completed);
      return completed;
    } catch (error) {
      const message = describeProcessingFailure(error);
      log.error({ err: error }, "Document processing failed");
      return this.markFailed(document, message, log);
    }
  }

  private async markFailed(
    document: DocumentRecord,
    message: string,
    log: Logger
  ): Promise<DocumentRecord | null> {
    const { documents, vectorStore, events } = this.deps;
    try {
      await vectorStore.deleteByDocument(document.id);
      const failed = await documents.updateStatus(document.id, "error", { errorMessage: message });
      if (failed) events.documentFailed(failed, message);
      return failed;
    } catch (error) {
      log.error({ err: error }, "Could not record document failure");
      events.documentFailed(document, message);
      return null;
    }
  }
}
