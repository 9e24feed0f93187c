import OpenAI from "openai";
import type { CompletionClient } from "../../interfaces/ports";

export class OpenAiCompletionClient implements CompletionClient {
  private openai: OpenAI;

  constructor(
    options: { apiKey: string; baseURL?: string },
    private model: string
  ) {
    this.openai = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: 0 });
  }

  async complete(prompt: string, options: { timeoutMs: number }) {
    const response = await this.openai.chat.completions.create(
      {
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        max_tokens: 10,
        temperature: 0.3
      },
      { timeout: options.timeoutMs }
    );
    return response.choices[0]?.message?.content ?? "";
  }
}
