import TemplateModel, { type ITemplate } from "../models/template.js";
import type { TemplateRecord } from "../types/index.js";

export interface NewTemplate {
  id: string;
  userId: string;
  name: string;
  description: string | null;
  storageKey: string;
  variables: Record<string, string>;
  metadata: Record<string, unknown>;
}

export type TemplatePatch = Partial<
  Pick<TemplateRecord, "name" | "description" | "metadata" | "isActive" | "variables" | "storageKey">
>;

export interface TemplateRepository {
  create(input: NewTemplate): Promise<TemplateRecord>;
  findForUser(id: string, userId: string): Promise<TemplateRecord | null>;
  /** Sorted by name; inactive templates only when asked for. */
  listByUser(userId: string, options?: { includeInactive?: boolean }): Promise<TemplateRecord[]>;
  update(
    id: string,
    userId: string,
    patch: TemplatePatch,
    options?: { bumpVersion?: boolean }
  ): Promise<TemplateRecord | null>;
  delete(id: string, userId: string): Promise<boolean>;
}

const toRecord = (doc: ITemplate): TemplateRecord => ({
  id: doc._id,
  userId: doc.userId,
  name: doc.name,
  description: doc.description ?? null,
  storageKey: doc.storageKey,
  variables: doc.variables ?? {},
  metadata: doc.metadata ?? {},
  version: doc.version,
  isActive: doc.isActive,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

export class MongoTemplateRepository implements TemplateRepository {
  async create(input: NewTemplate): Promise<TemplateRecord> {
    const { id, ...rest } = input;
    const doc = await TemplateModel.create({ _id: id, ...rest });
    return toRecord(doc.toObject());
  }

  async findForUser(id: string, userId: string): Promise<TemplateRecord | null> {
    const doc = await TemplateModel.findOne({ _id: id, userId }).lean<ITemplate>();
    return doc ? toRecord(doc) : null;
  }

  async listByUser(
    userId: string,
    { includeInactive = false }: { includeInactive?: boolean } = {}
  ): Promise<TemplateRecord[]> {
    const filter = includeInactive ? { userId } : { userId, isActive: true };
    const docs = await TemplateModel.find(filter).sort({ name: 1 }).lean<ITemplate[]>();
    return docs.map(toRecord);
  }

  async update(
    id: string,
    userId: string,
    patch: TemplatePatch,
    { bumpVersion = false }: { bumpVersion?: boolean } = {}
  ): Promise<TemplateRecord | null> {
    const doc = await TemplateModel.findOneAndUpdate(
      { _id: id, userId },
      bumpVersion ? { $set: patch, $inc: { version: 1 } } : { $set: patch },
      { new: true }
    ).lean<ITemplate>();
    return doc ? toRecord(doc) : null;
  }

  async delete(id: string, userId: string): Promise<boolean> {
    const result = await TemplateModel.deleteOne({ _id: id, userId });
    return result.deletedCount > 0;
  }
}
