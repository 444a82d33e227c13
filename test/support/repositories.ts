import { randomUUID } from "crypto";
import type { DocumentRepository, NewDocument, StatusUpdate } from "../../src/repositories/document_repository.js";
import type {
  NewTemplate,
  TemplatePatch,
  TemplateRepository,
} from "../../src/repositories/template_repository.js";
import type { NewUser, UserRepository } from "../../src/repositories/user_repository.js";
import type { SimilarityQuery, VectorStore } from "../../src/repositories/vector_store.js";
import type {
  ChunkRecord,
  DocumentRecord,
  DocumentStatus,
  ScoredChunk,
  TemplateRecord,
  UserRecord,
} from "../../src/types/index.js";
import { ConflictError } from "../../src/utils/errors.js";

/** Monotonic clock so "newest first" orderings are deterministic. */
export class TickClock {
  private current: number;

  constructor(start = Date.UTC(2024, 0, 1)) {
    this.current = start;
  }

  next(): Date {
    this.current += 1000;
    return new Date(this.current);
  }
}

export class InMemoryUserRepository implements UserRepository {
  readonly users = new Map<string, UserRecord>();

  constructor(private readonly clock = new TickClock()) {}

  async findById(id: string): Promise<UserRecord | null> {
    return this.users.get(id) ?? null;
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    return [...this.users.values()].find((user) => user.username === username) ?? null;
  }

  async create(input: NewUser): Promise<UserRecord> {
    if (await this.findByUsername(input.username)) {
      throw new ConflictError("User already registered");
    }
    const user: UserRecord = { id: randomUUID(), ...input, createdAt: this.clock.next() };
    this.users.set(user.id, user);
    return user;
  }
}

export class InMemoryDocumentRepository implements DocumentRepository {
  readonly documents = new Map<string, DocumentRecord>();
  /** Every status a document passed through, in order. */
  readonly history = new Map<string, DocumentStatus[]>();

  constructor(private readonly clock = new TickClock()) {}

  async create(input: NewDocument): Promise<DocumentRecord> {
    const now = this.clock.next();
    const doc: DocumentRecord = {
      ...input,
      status: "pending",
      errorMessage: null,
      metadata: {},
      createdAt: now,
      updatedAt: now,
    };
    this.documents.set(doc.id, doc);
    this.history.set(doc.id, ["pending"]);
    return { ...doc };
  }

  async findById(id: string): Promise<DocumentRecord | null> {
    const doc = this.documents.get(id);
    return doc ? { ...doc } : null;
  }

  async findForUser(id: string, userId: string): Promise<DocumentRecord | null> {
    const doc = this.documents.get(id);
    return doc && doc.userId === userId ? { ...doc } : null;
  }

  async listByUser(userId: string): Promise<DocumentRecord[]> {
    return [...this.documents.values()]
      .filter((doc) => doc.userId === userId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map((doc) => ({ ...doc }));
  }

  async updateStatus(
    id: string,
    status: DocumentStatus,
    update: StatusUpdate = {}
  ): Promise<DocumentRecord | null> {
    const doc = this.documents.get(id);
    if (!doc) return null;

    const next: DocumentRecord = {
      ...doc,
      status,
      errorMessage: update.errorMessage !== undefined ? update.errorMessage : doc.errorMessage,
      metadata: { ...doc.metadata, ...(update.metadata ?? {}) },
      updatedAt: this.clock.next(),
    };
    this.documents.set(id, next);
    this.history.get(id)?.push(status);
    return { ...next };
  }

  async delete(id: string): Promise<boolean> {
    return this.documents.delete(id);
  }
}

export class InMemoryTemplateRepository implements TemplateRepository {
  readonly templates = new Map<string, TemplateRecord>();

  constructor(private readonly clock = new TickClock()) {}

  async create(input: NewTemplate): Promise<TemplateRecord> {
    const now = this.clock.next();
    const template: TemplateRecord = {
      ...input,
      version: 1,
      isActive: true,
      createdAt: now,
      updatedAt: now,
    };
    this.templates.set(template.id, template);
    return { ...template };
  }

  async findForUser(id: string, userId: string): Promise<TemplateRecord | null> {
    const template = this.templates.get(id);
    return template && template.userId === userId ? { ...template } : null;
  }

  async listByUser(
    userId: string,
    { includeInactive = false }: { includeInactive?: boolean } = {}
  ): Promise<TemplateRecord[]> {
    return [...this.templates.values()]
      .filter((t) => t.userId === userId && (includeInactive || t.isActive))
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((t) => ({ ...t }));
  }

  async update(
    id: string,
    userId: string,
    patch: TemplatePatch,
    { bumpVersion = false }: { bumpVersion?: boolean } = {}
  ): Promise<TemplateRecord | null> {
    const current = this.templates.get(id);
    if (!current || current.userId !== userId) return null;

    const next: TemplateRecord = {
      ...current,
      ...patch,
      version: bumpVersion ? current.version + 1 : current.version,
      updatedAt: this.clock.next(),
    };
    this.templates.set(id, next);
    return { ...next };
  }

  async delete(id: string, userId: string): Promise<boolean> {
    const current = this.templates.get(id);
    if (!current || current.userId !== userId) return false;
    return this.templates.delete(id);
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Scores like an Atlas cosine index, (1 + cosine) / 2, and applies the limit
 * before the threshold, as the aggregation pipeline does.
 */
export class InMemoryVectorStore implements VectorStore {
  readonly chunks = new Map<string, ChunkRecord>();
  readonly queries: SimilarityQuery[] = [];

  async insertChunks(chunks: ChunkRecord[]): Promise<void> {
    for (const chunk of chunks) this.chunks.set(chunk.id, chunk);
  }

  async countByDocument(documentId: string): Promise<number> {
    return [...this.chunks.values()].filter((c) => c.documentId === documentId).length;
  }

  async deleteByDocument(documentId: string): Promise<number> {
    let removed = 0;
    for (const [id, chunk] of this.chunks) {
      if (chunk.documentId === documentId) {
        this.chunks.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async searchSimilar(query: SimilarityQuery): Promise<ScoredChunk[]> {
    this.queries.push(query);
    return [...this.chunks.values()]
      .filter(
        (c) => c.userId === query.userId && (!query.documentId || c.documentId === query.documentId)
      )
      .map((c) => ({
        id: c.id,
        documentId: c.documentId,
        content: c.content,
        metadata: c.metadata,
        similarity: (1 + cosineSimilarity(query.embedding, c.embedding)) / 2,
      }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, query.limit)
      .filter((c) => c.similarity >= query.similarityThreshold);
  }
}
