import { getEncoding, type Tiktoken } from "js-tiktoken";

export interface Tokenizer {
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

export interface ChunkOptions {
  /** Window length, in tokens. */
  chunkSize: number;
  /** Tokens shared by consecutive windows. */
  chunkOverlap: number;
}

export interface TextChunk {
  index: number;
  content: string;
  tokenCount: number;
  startToken: number;
  endToken: number;
}

let cl100k: Tiktoken | null = null;

/**
 * The encoder used by the OpenAI embedding and chat models, built on first use.
 * Special-token markers in document text are encoded as plain text.
 */
export function defaultTokenizer(): Tokenizer {
  if (!cl100k) cl100k = getEncoding("cl100k_base");
  const encoder = cl100k;
  return {
    encode: (text) => encoder.encode(text, [], []),
    decode: (tokens) => encoder.decode(tokens),
  };
}

export function countTokens(text: string, tokenizer: Tokenizer = defaultTokenizer()): number {
  return tokenizer.encode(text).length;
}

/**
 * Splits `text` into fixed-size token windows. Windows start every
 * `chunkSize - chunkOverlap` tokens; the last one ends at the final token.
 */
export function chunkText(
  text: string,
  { chunkSize, chunkOverlap }: ChunkOptions,
  tokenizer: Tokenizer = defaultTokenizer()
): TextChunk[] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new RangeError(
      `chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}`
    );
  }
  if (!text.trim()) return [];

  const tokens = tokenizer.encode(text);
  const step = chunkSize - chunkOverlap;
  const chunks: TextChunk[] = [];

  for (let start = 0; start < tokens.length; start += step) {
    const end = Math.min(start + chunkSize, tokens.length);
    const content = tokenizer.decode(tokens.slice(start, end));

    if (content.trim()) {
      chunks.push({
        index: chunks.length,
        content,
        tokenCount: end - start,
        startToken: start,
        endToken: end,
      });
    }

    if (end === tokens.length) break;
  }

  return chunks;
}
