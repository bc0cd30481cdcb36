import { GoogleGenerativeAI, type GenerativeModel, type Part } from '@google/generative-ai';
import type { LanguageModel, MediaAttachment } from './languageModel';

export class GeminiModel implements LanguageModel {
  readonly name: string;
  private readonly model: GenerativeModel;

  constructor(apiKey: string, modelName: string) {
    this.name = modelName;
    this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model: modelName });
  }

  async generate(prompt: string, attachments: MediaAttachment[] = []): Promise<string> {
    const parts: Array<string | Part> = [prompt];
    for (const attachment of attachments) {
      parts.push({
        inlineData: {
          mimeType: attachment.mimeType,
          data: attachment.data.toString('base64'),
        },
      });
    }

    const result = await this.model.generateContent(parts);
    return result.response.text();
  }
}
