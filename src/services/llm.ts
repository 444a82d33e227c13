import type OpenAI from "openai";
import { UpstreamError, getErrorMessage } from "../utils/errors.js";
import type { OpenAICallPolicy } from "./openai_client.js";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface ChatModel {
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
}

export class OpenAIChatModel implements ChatModel {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    private readonly policy: OpenAICallPolicy
  ) {}

  async complete(
    messages: ChatMessage[],
    { temperature = 0.7, maxTokens = 500 }: CompletionOptions = {}
  ): Promise<string> {
    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await this.policy.run("OpenAI chat completion", () =>
        this.client.chat.completions.create({
          model: this.model,
          messages,
          temperature,
          max_tokens: maxTokens,
        })
      );
    } catch (error) {
      throw new UpstreamError(`Chat model request failed: ${getErrorMessage(error)}`);
    }

    const content = completion.choices[0]?.message?.content;
    if (!content) throw new UpstreamError("Chat model returned an empty response");
    return content;
  }
}
