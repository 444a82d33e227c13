import { describe, it, expect } from "vitest";
import { buildAnswerMessages, buildExtractionMessages, formatContext, parseJsonObject } from "./prompt_builder.js";
import { UpstreamError } from "../utils/errors.js";
import type { ScoredChunk } from "../types/index.js";

const chunk = (content: string): ScoredChunk => ({
  id: content,
  documentId: "doc-1",
  content,
  similarity: 0.9,
  metadata: { chunk_index: 0, token_count: 3, start_token: 0, filename: "a.txt", source: "txt" },
});

describe("prompt_builder", () => {
  it("numbers the context blocks", () => {
    expect(formatContext([chunk("alpha"), chunk("beta")])).toBe("Document 1:\nalpha\n\nDocument 2:\nbeta");
  });

  it("builds the question-answering prompt", () => {
    const [system, user] = buildAnswerMessages("Who signed?", [chunk("Signed by Ada.")]);

    expect(system).toEqual({
      role: "system",
      content: "You are a helpful assistant that answers questions based on the provided document context.",
    });
    expect(user).toEqual({
      role: "user",
      content:
        "Based on the following context, answer the question. If the answer cannot be found in the context, say so.\n\n" +
        "Context:\nDocument 1:\nSigned by Ada.\n\n" +
        "Question: Who signed?\n\n" +
        "Answer:",
    });
  });

  it("lists the template variables in the extraction prompt", () => {
    const [, user] = buildExtractionMessages("Fill the offer", [chunk("Ada starts in June.")], ["name", "start_date"]);

    expect(user.content).toBe(
      "Based on the following context, extract the information needed for the template. " +
        "Format your response as a JSON object with the template variables as keys.\n\n" +
        "Template variables:\n- name\n- start_date\n\n" +
        "Context:\nDocument 1:\nAda starts in June.\n\n" +
        "Question/Request: Fill the offer\n\n" +
        "Extract the relevant information and format it as JSON:"
    );
  });

  describe("parseJsonObject", () => {
    it("parses a bare JSON object", () => {
      expect(parseJsonObject('{"name": "Ada", "age": 36}')).toEqual({ name: "Ada", age: 36 });
    });

    it("falls back to the outermost braces inside prose", () => {
      const reply = 'Here you go:\n```json\n{"name": "Ada", "team": {"lead": "Grace"}}\n```\nAnything else?';
      expect(parseJsonObject(reply)).toEqual({ name: "Ada", team: { lead: "Grace" } });
    });

    it("rejects replies without an object", () => {
      for (const reply of ["no json here", "[1, 2, 3]", '"just a string"', "{not: valid}", "null"]) {
        expect(() => parseJsonObject(reply)).toThrow(
          new UpstreamError("Could not extract valid JSON from the response")
        );
      }
    });
  });
});
