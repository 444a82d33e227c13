import DocumentModel, { type IDocument } from "../models/documents.js";
import type { DocumentMetadata, DocumentRecord, DocumentStatus } from "../types/index.js";

export interface NewDocument {
  id: string;
  userId: string;
  filename: string;
  mimeType: string;
  size: number;
  storageKey: string;
}

export interface StatusUpdate {
  errorMessage?: string | null;
  /** Merged into the stored metadata key by key. */
  metadata?: DocumentMetadata;
}

export interface DocumentRepository {
  create(input: NewDocument): Promise<DocumentRecord>;
  findById(id: string): Promise<DocumentRecord | null>;
  /** Only returns the document when `userId` owns it. */
  findForUser(id: string, userId: string): Promise<DocumentRecord | null>;
  /** Newest first. */
  listByUser(userId: string): Promise<DocumentRecord[]>;
  updateStatus(id: string, status: DocumentStatus, update?: StatusUpdate): Promise<DocumentRecord | null>;
  delete(id: string): Promise<boolean>;
}

const toRecord = (doc: IDocument): DocumentRecord => ({
  id: doc._id,
  userId: doc.userId,
  filename: doc.filename,
  mimeType: doc.mimeType,
  size: doc.size,
  storageKey: doc.storageKey,
  status: doc.status,
  errorMessage: doc.errorMessage ?? null,
  metadata: doc.metadata ?? {},
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

export class MongoDocumentRepository implements DocumentRepository {
  async create(input: NewDocument): Promise<DocumentRecord> {
    const { id, ...rest } = input;
    const doc = await DocumentModel.create({ _id: id, ...rest, status: "pending" });
    return toRecord(doc.toObject());
  }

  async findById(id: string): Promise<DocumentRecord | null> {
    const doc = await DocumentModel.findById(id).lean<IDocument>();
    return doc ? toRecord(doc) : null;
  }

  async findForUser(id: string, userId: string): Promise<DocumentRecord | null> {
    const doc = await DocumentModel.findOne({ _id: id, userId }).lean<IDocument>();
    return doc ? toRecord(doc) : null;
  }

  async listByUser(userId: string): Promise<DocumentRecord[]> {
    const docs = await DocumentModel.find({ userId }).sort({ createdAt: -1 }).lean<IDocument[]>();
    return docs.map(toRecord);
  }

  async updateStatus(
    id: string,
    status: DocumentStatus,
    update: StatusUpdate = {}
  ): Promise<DocumentRecord | null> {
    const set: Record<string, unknown> = { status };
    if (update.errorMessage !== undefined) set.errorMessage = update.errorMessage;
    for (const [key, value] of Object.entries(update.metadata ?? {})) {
      set[`metadata.${key}`] = value;
    }

    const doc = await DocumentModel.findByIdAndUpdate(id, { $set: set }, { new: true }).lean<IDocument>();
    return doc ? toRecord(doc) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await DocumentModel.deleteOne({ _id: id });
    return result.deletedCount > 0;
  }
}
