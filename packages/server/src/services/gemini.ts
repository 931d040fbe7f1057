import { ApiError, GoogleGenAI } from '@google/genai';
import type { ReasoningEffort } from '../config/env';
import type { GenerationCall, IGenerationBackend } from '../domain/ports';

const THINKING_BUDGETS: Record<ReasoningEffort, number> = {
  low: 1024,
  medium: 8192,
  high: 24576
};

/**
 * Gemini behind the two call protocols the generation client alternates between.
 */
export class GeminiBackend implements IGenerationBackend {
  private ai: GoogleGenAI;

  constructor(apiKey: string) {
    if (!apiKey) {
      console.warn('⚠️ GEMINI_API_KEY is missing. Metadata generation will fail.');
    }
    this.ai = new GoogleGenAI({ apiKey });
  }

  // Single request with the reasoning budget applied
  public async generate(call: GenerationCall): Promise<string> {
    const response = await this.ai.models.generateContent({
      model: call.model,
      contents: call.userPayload,
      config: {
        systemInstruction: call.systemInstruction,
        thinkingConfig: { thinkingBudget: THINKING_BUDGETS[call.reasoningEffort] }
      }
    });
    return response.text ?? '';
  }

  // Streamed request without a thinking budget, for models that reject one
  public async stream(call: GenerationCall): Promise<string> {
    const chunks = await this.ai.models.generateContentStream({
      model: call.model,
      contents: call.userPayload,
      config: { systemInstruction: call.systemInstruction }
    });

    let text = '';
    for await (const chunk of chunks) {
      text += chunk.text ?? '';
    }
    return text;
  }

  public isPermissionError(error: unknown): boolean {
    if (error instanceof ApiError && error.status === 403) return true;
    return error instanceof Error && error.message.includes('PERMISSION_DENIED');
  }
}
