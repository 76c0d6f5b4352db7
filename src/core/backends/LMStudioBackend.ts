// LM Studio: OpenAI-compatible chat completions with SSE streaming

import type { BackendRequest, ChatMessage, ContentPart, GenerateOptions } from '../types.js';
import { openAIWireFormat, type OpenAIChatFrame } from '../wire/openai.js';
import { HttpBackend, type HttpBackendConfig } from './HttpBackend.js';

export interface ChatCompletionBody {
  model: string;
  messages: ChatMessage[];
  stream: boolean;
  max_tokens?: number;
  temperature?: number;
  top_p?: number;
  seed?: number;
}

export class LMStudioBackend extends HttpBackend<OpenAIChatFrame, ChatCompletionBody> {
  constructor(config: HttpBackendConfig) {
    super('lmstudio', openAIWireFormat, config);
  }

  protected get generatePath(): string {
    return '/chat/completions';
  }

  protected async buildBody(request: BackendRequest, options: GenerateOptions, stream: boolean): Promise<ChatCompletionBody> {
    const messages: ChatMessage[] = [];

    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    messages.push({ role: 'user', content: await this.buildUserContent(request.prompt, options.images) });

    const body: ChatCompletionBody = { model: this.model, messages, stream };
    const maxTokens = options.maxTokens ?? options.numCtx;
    if (maxTokens !== undefined) body.max_tokens = maxTokens;
    if (options.temperature !== undefined) body.temperature = options.temperature;
    if (options.topP !== undefined) body.top_p = options.topP;
    if (options.seed !== undefined) body.seed = options.seed;

    return body;
  }

  // Plain string without images; otherwise the text part first, then one part per image
  private async buildUserContent(prompt: string, images: string[] | undefined): Promise<string | ContentPart[]> {
    if (!images || images.length === 0) {
      return prompt;
    }

    const urls = await this.imageEncoder.encodeAllAsDataUrls(images);
    return [
      { type: 'text', text: prompt },
      ...urls.map((url): ContentPart => ({ type: 'image_url', image_url: { url } })),
    ];
  }
}
