import type { EmbeddingProvider } from "../../src/services/embeddings.js";
import type { ChatMessage, ChatModel, CompletionOptions } from "../../src/services/llm.js";
import type { ObjectStorage } from "../../src/services/storage.js";
import type { DocumentRecord } from "../../src/types/index.js";
import type { DocumentEvents } from "../../src/utils/socket_server.js";
import { NotFoundError } from "../../src/utils/errors.js";

export class InMemoryStorage implements ObjectStorage {
  readonly objects = new Map<string, { body: Buffer; contentType: string }>();

  async put(key: string, body: Buffer, contentType: string): Promise<void> {
    this.objects.set(key, { body: Buffer.from(body), contentType });
  }

  async get(key: string): Promise<Buffer> {
    const object = this.objects.get(key);
    if (!object) throw new NotFoundError(`Object not found: ${key}`);
    return object.body;
  }

  async delete(key: string): Promise<void> {
    this.objects.delete(key);
  }

  async getDownloadUrl(key: string): Promise<string> {
    return `https://storage.test/${key}`;
  }
}

export const EMBEDDING_DIMENSION = 64;

/**
 * Bag-of-words vectors: each lower-cased word adds 1 to a hashed slot.
 * Identical texts embed identically; texts without shared words are usually
 * orthogonal.
 */
export function embedText(text: string, dimension = EMBEDDING_DIMENSION): number[] {
  const vector = new Array<number>(dimension).fill(0);
  for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    let hash = 0;
    for (const ch of word) hash = (hash * 31 + ch.charCodeAt(0)) >>> 0;
    vector[hash % dimension] += 1;
  }
  return vector;
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly calls: string[][] = [];
  /** Makes the next call reject with this error. */
  failWith: Error | null = null;

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    if (this.failWith) {
      const error = this.failWith;
      this.failWith = null;
      throw error;
    }
    return texts.map((text) => embedText(text));
  }
}

type Reply = string | Error | ((messages: ChatMessage[]) => string);

/** Answers from a queue of scripted replies, recording every request. */
export class ScriptedChatModel implements ChatModel {
  readonly calls: { messages: ChatMessage[]; options?: CompletionOptions }[] = [];
  private readonly replies: Reply[];

  constructor(...replies: Reply[]) {
    this.replies = replies;
  }

  reply(...replies: Reply[]): this {
    this.replies.push(...replies);
    return this;
  }

  async complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string> {
    this.calls.push({ messages, options });
    const next = this.replies.shift();
    if (next === undefined) throw new Error("ScriptedChatModel has no reply left");
    if (next instanceof Error) throw next;
    return typeof next === "function" ? next(messages) : next;
  }
}

export class RecordingDocumentEvents implements DocumentEvents {
  readonly ready: DocumentRecord[] = [];
  readonly failed: { document: DocumentRecord; error: string }[] = [];

  documentReady(document: DocumentRecord): void {
    this.ready.push(document);
  }

  documentFailed(document: DocumentRecord, error: string): void {
    this.failed.push({ document, error });
  }
}
