import OpenAI from "openai";
import { ConfigError } from "../errors";
import type { CompletionRequest, GenerationBackend } from "../types";

interface OpenAIChatBackendOptions {
    apiKey?: string;
    model: string;
    baseUrl?: string;
    temperature: number;
    /** Pre-built client; tests pass a stand-in */
    client?: OpenAI;
}

/** Chat-completions backend; one system + one user message per request */
export class OpenAIChatBackend implements GenerationBackend {
    readonly name = "OpenAIChatBackend";

    private readonly client: OpenAI;
    private readonly model: string;
    private readonly temperature: number;

    constructor(options: OpenAIChatBackendOptions) {
        if (options.client) {
            this.client = options.client;
        } else {
            if (!options.apiKey) {
                throw new ConfigError(["OPENAI_API_KEY is required for generation"]);
            }
            this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl, maxRetries: 0 });
        }

        this.model = options.model;
        this.temperature = options.temperature;
    }

    async complete(request: CompletionRequest): Promise<string> {
        const completion = await this.client.chat.completions.create(
            {
                model: this.model,
                temperature: this.temperature,
                max_tokens: request.maxOutputTokens,
                messages: [
                    { role: "system", content: request.system },
                    { role: "user", content: request.prompt },
                ],
            },
            { signal: request.signal }
        );

        const content = completion.choices[0]?.message?.content?.trim();
        if (!content) {
            throw new Error(`[${this.name}] Empty completion from model ${this.model}`);
        }
        return content;
    }
}
