import http from "http";
import OpenAI from "openai";

export interface RecordedRequest {
  method: string;
  path: string;
  body: unknown;
}

export interface FakeReply {
  status: number;
  body: unknown;
}

export interface FakeOpenAIServer {
  client: OpenAI;
  requests: RecordedRequest[];
  close(): Promise<void>;
}

/**
 * Local HTTP server standing in for the OpenAI API; replies come from
 * `respond`, called once per request.
 */
export async function startFakeOpenAI(
  respond: (request: RecordedRequest, index: number) => FakeReply
): Promise<FakeOpenAIServer> {
  const requests: RecordedRequest[] = [];

  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      const raw = Buffer.concat(chunks).toString("utf8");
      const request: RecordedRequest = {
        method: req.method ?? "GET",
        path: req.url ?? "/",
        body: raw ? JSON.parse(raw) : null,
      };
      requests.push(request);

      const reply = respond(request, requests.length - 1);
      res.writeHead(reply.status, { "Content-Type": "application/json" });
      res.end(JSON.stringify(reply.body));
    });
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("Server did not bind a TCP port");

  return {
    client: new OpenAI({
      apiKey: "test-openai-key",
      baseURL: `http://127.0.0.1:${address.port}/v1`,
      maxRetries: 0,
    }),
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

export const embeddingReply = (vectors: number[][], order = vectors.map((_, i) => i)): FakeReply => ({
  status: 200,
  body: {
    object: "list",
    model: "text-embedding-3-small",
    data: order.map((index) => ({ object: "embedding", index, embedding: vectors[index] })),
    usage: { prompt_tokens: 1, total_tokens: 1 },
  },
});

export const completionReply = (content: string | null): FakeReply => ({
  status: 200,
  body: {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 1_700_000_000,
    model: "gpt-3.5-turbo",
    choices: [{ index: 0, finish_reason: "stop", message: { role: "assistant", content } }],
    usage: { prompt_tokens: 1, completion_tokens: 1, total_tokens: 2 },
  },
});

export const errorReply = (status: number, message: string): FakeReply => ({
  status,
  body: { error: { message, type: "invalid_request_error", code: null } },
});
