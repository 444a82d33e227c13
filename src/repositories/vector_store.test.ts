import { describe, it, expect } from "vitest";
import { buildVectorSearchPipeline } from "./vector_store.js";

describe("buildVectorSearchPipeline", () => {
  it("searches the user's chunks and drops scores under the threshold", () => {
    const pipeline = buildVectorSearchPipeline("chunk_embedding_index", {
      embedding: [0.1, 0.2],
      userId: "user-1",
      limit: 5,
      similarityThreshold: 0.75,
    });

    expect(pipeline).toEqual([
      {
        $vectorSearch: {
          index: "chunk_embedding_index",
          path: "embedding",
          queryVector: [0.1, 0.2],
          numCandidates: 100,
          limit: 5,
          filter: { userId: "user-1" },
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
      { $match: { similarity: { $gte: 0.75 } } },
    ]);
  });

  it("narrows to one document and widens the candidate pool with the limit", () => {
    const [search] = buildVectorSearchPipeline("idx", {
      embedding: [1],
      userId: "user-1",
      limit: 20,
      similarityThreshold: 0.5,
      documentId: "doc-9",
    });

    expect(search).toMatchObject({
      $vectorSearch: { numCandidates: 200, limit: 20, filter: { userId: "user-1", documentId: "doc-9" } },
    });
  });
});
