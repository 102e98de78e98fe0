import { GoogleGenerativeAI, GenerativeModel } from '@google/generative-ai';
import { ModelError } from '../models/errors';
import { TextModel } from '../models/Recommendation';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';

/**
 * Very small wrapper around the Gemini SDK.  Any SDK failure, a blocked
 * answer (`response.text()` throws) or an empty answer becomes a ModelError.
 */
export class GeminiService implements TextModel {
  private readonly model: GenerativeModel;

  constructor(apiKey: string, modelName = DEFAULT_GEMINI_MODEL) {
    this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model: modelName });
  }

  async generate(prompt: string): Promise<string> {
    let text: string;
    try {
      const result = await this.model.generateContent(prompt);
      text = result.response.text();
    } catch (err) {
      throw new ModelError('Gemini request failed', err);
    }

    if (text.trim().length === 0) {
      throw new ModelError('Gemini returned an empty answer');
    }
    return text;
  }
}
