import OpenAI from 'openai';
import type { ContentGenerator, GenerationRequest } from './types.ts';

export interface OpenAIGeneratorOptions {
  apiKey: string;
  model: string;
  imageModel: string;
}

/** Text-in/text-out and text-in/image-out, nothing more. Parsing lives in payload.ts. */
export class OpenAIContentGenerator implements ContentGenerator {
  private readonly openai: OpenAI;
  private readonly model: string;
  private readonly imageModel: string;

  constructor({ apiKey, model, imageModel }: OpenAIGeneratorOptions) {
    this.openai = new OpenAI({ apiKey });
    this.model = model;
    this.imageModel = imageModel;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const resp = await this.openai.chat.completions.create({
      model: this.model,
      messages: [{ role: 'user', content: request.prompt }],
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    });
    return (resp.choices[0]?.message.content ?? '').trim();
  }

  async generateImage(prompt: string): Promise<Buffer> {
    const response = await this.openai.images.generate({
      model: this.imageModel,
      prompt: prompt.slice(0, 3200),
      size: '1024x1024',
      n: 1,
    });
    const first = response.data?.[0];
    if (first?.b64_json) return Buffer.from(first.b64_json, 'base64');
    if (first?.url) {
      const res = await fetch(first.url);
      if (!res.ok) throw new Error(`Image download failed with HTTP ${res.status}`);
      return Buffer.from(await res.arrayBuffer());
    }
    throw new Error('Image API returned no image data.');
  }
}
