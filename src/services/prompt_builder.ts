import type { ScoredChunk } from "../types/index.js";
import { UpstreamError } from "../utils/errors.js";
import type { ChatMessage } from "./llm.js";

const ANSWER_SYSTEM_PROMPT =
  "You are a helpful assistant that answers questions based on the provided document context.";

const EXTRACTION_SYSTEM_PROMPT =
  "You are a helpful assistant that extracts structured information from text. Format your response as a valid JSON object.";

/** "Document 1:\n…\n\nDocument 2:\n…" */
export function formatContext(chunks: Pick<ScoredChunk, "content">[]): string {
  return chunks.map((chunk, i) => `Document ${i + 1}:\n${chunk.content}`).join("\n\n");
}

export function buildAnswerMessages(query: string, chunks: ScoredChunk[]): ChatMessage[] {
  const prompt = `
Based on the following context, answer the question. If the answer cannot be found in the context, say so.

Context:
${formatContext(chunks)}

Question: ${query}

Answer:
`.trim();

  return [
    { role: "system", content: ANSWER_SYSTEM_PROMPT },
    { role: "user", content: prompt },
  ];
}

export function buildExtractionMessages(
  query: string,
  chunks: ScoredChunk[],
  variables: string[]
): ChatMessage[] {
  const keys = variables.length > 0 ? variables.map((name) => `- ${name}`).join("\n") : "- (none declared)";

  const prompt = `
Based on the following context, extract the information needed for the template. Format your response as a JSON object with the template variables as keys.

Template variables:
${keys}

Context:
${formatContext(chunks)}

Question/Request: ${query}

Extract the relevant information and format it as JSON:
`.trim();

  return [
    { role: "system", content: EXTRACTION_SYSTEM_PROMPT },
    { role: "user", content: prompt },
  ];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Reads a JSON object out of a model reply: the whole reply first, then the
 * span from the first "{" to the last "}".
 */
export function parseJsonObject(reply: string): Record<string, unknown> {
  let parsed = tryParse(reply.trim());

  if (parsed === undefined) {
    const start = reply.indexOf("{");
    const end = reply.lastIndexOf("}");
    if (start >= 0 && end > start) parsed = tryParse(reply.slice(start, end + 1));
  }

  if (!isPlainObject(parsed)) {
    throw new UpstreamError("Could not extract valid JSON from the response");
  }
  return parsed;
}
