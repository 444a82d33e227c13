import type { PipelineStage } from "mongoose";
import Chunk, { type IChunk } from "../models/chunkModel.js";
import type { ChunkMetadata, ChunkRecord, ScoredChunk } from "../types/index.js";

export interface SimilarityQuery {
  embedding: number[];
  userId: string;
  limit: number;
  similarityThreshold: number;
  /** Restrict the search to one document. */
  documentId?: string;
}

/**
 * Chunk storage plus nearest-neighbour search. The search itself runs inside
 * the database; nothing here ranks vectors.
 */
export interface VectorStore {
  insertChunks(chunks: ChunkRecord[]): Promise<void>;
  countByDocument(documentId: string): Promise<number>;
  deleteByDocument(documentId: string): Promise<number>;
  /** Ordered by similarity, highest first; only rows at or above the threshold. */
  searchSimilar(query: SimilarityQuery): Promise<ScoredChunk[]>;
}

interface ScoredChunkRow {
  _id: string;
  documentId: string;
  content: string;
  metadata: ChunkMetadata;
  similarity: number;
}

export function buildVectorSearchPipeline(indexName: string, query: SimilarityQuery): PipelineStage[] {
  const filter: Record<string, string> = { userId: query.userId };
  if (query.documentId) filter.documentId = query.documentId;

  return [
    {
      $vectorSearch: {
        index: indexName,
        path: "embedding",
        queryVector: query.embedding,
        numCandidates: Math.max(query.limit * 10, 100),
        limit: query.limit,
        filter,
      },
    },
    {
      $project: {
        _id: 1,
        documentId: 1,
        content: 1,
        metadata: 1,
        similarity: { $meta: "vectorSearchScore" },
      },
    },
    { $match: { similarity: { $gte: query.similarityThreshold } } },
  ];
}

export class MongoVectorStore implements VectorStore {
  constructor(private readonly indexName: string) {}

  async insertChunks(chunks: ChunkRecord[]): Promise<void> {
    if (chunks.length === 0) return;
    const docs: IChunk[] = chunks.map(({ id, ...rest }) => ({ _id: id, ...rest }));
    await Chunk.insertMany(docs, { ordered: true });
  }

  async countByDocument(documentId: string): Promise<number> {
    return Chunk.countDocuments({ documentId });
  }

  async deleteByDocument(documentId: string): Promise<number> {
    const result = await Chunk.deleteMany({ documentId });
    return result.deletedCount;
  }

  async searchSimilar(query: SimilarityQuery): Promise<ScoredChunk[]> {
    const rows = await Chunk.aggregate<ScoredChunkRow>(buildVectorSearchPipeline(this.indexName, query));
    return rows.map((row) => ({
      id: row._id,
      documentId: row.documentId,
      content: row.content,
      metadata: row.metadata,
      similarity: row.similarity,
    }));
  }
}
