import OpenAI from "openai";

import type { RemoteLLMProvider } from "../../config/llm_providers";
import { jsonOnlyInstruction, requireProviderApiKey, requireProviderBaseUrl } from "./config";
import type { AnthropicCompletionResponse, LLMClient, LLMCompletionRequest } from "./types";

class OpenAIProviderClient implements LLMClient {
  readonly provider: RemoteLLMProvider = "OpenAI";
  private readonly client: OpenAI;

  constructor() {
    this.client = new OpenAI({
      apiKey: requireProviderApiKey("OpenAI"),
      baseURL: requireProviderBaseUrl("OpenAI"),
    });
  }

  async complete(request: LLMCompletionRequest): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: request.model,
        messages: [
          { role: "system", content: request.systemMessage },
          { role: "user", content: request.userMessage },
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        response_format: request.requireJsonObject ? { type: "json_object" } : undefined,
      },
      { signal: request.signal },
    );

    return response.choices[0]?.message?.content ?? "";
  }
}

class AnthropicProviderClient implements LLMClient {
  readonly provider: RemoteLLMProvider = "Anthropic";

  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor() {
    this.apiKey = requireProviderApiKey("Anthropic");
    this.baseUrl = requireProviderBaseUrl("Anthropic");
  }

  async complete(request: LLMCompletionRequest): Promise<string> {
    const response = await fetch(`${this.baseUrl}/v1/messages`, {
      method: "POST",
      headers: {
        "x-api-key": this.apiKey,
        "anthropic-version": "2023-06-01",
        "content-type": "application/json",
      },
      body: JSON.stringify({
        model: request.model,
        system: request.systemMessage,
        messages: [
          {
            role: "user",
            content: `${request.userMessage}${jsonOnlyInstruction(Boolean(request.requireJsonObject))}`,
          },
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      }),
      signal: request.signal,
    });

    const payload = (await response.json().catch(() => ({}))) as AnthropicCompletionResponse;
    if (!response.ok) {
      const message = payload.error?.message ?? response.statusText;
      throw new Error(`Anthropic completion failed (${response.status}): ${message}`);
    }

    const textChunk = payload.content?.find((entry) => entry.type === "text");
    return textChunk?.text ?? "";
  }
}

export function createProviderClient(provider: RemoteLLMProvider): LLMClient {
  if (provider === "OpenAI") {
    return new OpenAIProviderClient();
  }

  return new AnthropicProviderClient();
}
