import mongoose, { Schema } from "mongoose";
import { randomUUID } from "crypto";
import type { ChunkMetadata } from "../types/index.js";

export interface IChunk {
  _id: string;
  documentId: string;
  userId: string;
  content: string;
  embedding: number[];
  metadata: ChunkMetadata;
  createdAt: Date;
}

/**
 * Chunks live in their own collection so the Atlas vector index
 * (`VECTOR_INDEX_NAME`) can be defined on `embedding`, with `userId` and
 * `documentId` declared as filter fields.
 */
const chunkSchema = new Schema<IChunk>(
  {
    _id: {
      type: String,
      default: () => randomUUID(),
    },
    documentId: { type: String, required: true, index: true },
    userId: { type: String, required: true, index: true },
    content: { type: String, required: true },
    embedding: { type: [Number], required: true },
    metadata: { type: Schema.Types.Mixed, default: () => ({}) },
    createdAt: { type: Date, default: Date.now },
  },
  {
    collection: "document_chunks",
  }
);

export default mongoose.model<IChunk>("Chunk", chunkSchema);
