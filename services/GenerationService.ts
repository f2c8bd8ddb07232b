import { GenerativeModel, GoogleGenerativeAI } from '@google/generative-ai';
import { ConfigurationError, GenerationUnavailableError, RagError } from '../utils/errors';
import { withTimeout } from '../utils/retry';

export interface GenerationRequest {
  question: string;
  context: string; // may be empty when nothing in scope matched
}

/** Black-box answer generation over an assembled context. */
export interface Generator {
  generate(request: GenerationRequest): Promise<string>;
}

export interface GenerationServiceOptions {
  apiKey?: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

export const SYSTEM_PROMPT =
  'You are a helpful assistant that answers questions based on the provided context. ' +
  'Only use information from the context. If the context does not contain enough ' +
  'information to answer, say so clearly. Cite which source documents you drew from.';

export function buildPrompt({ question, context }: GenerationRequest): string {
  const contextSection = context.length > 0 ? context : '(no accessible documents matched this question)';

  return `Context (retrieved documents):
${contextSection}

Question: ${question}

Answer based on the context above:`;
}

export class GenerationService implements Generator {
  private modelInstance: GenerativeModel;

  constructor(private readonly options: GenerationServiceOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError('GEMINI_API_KEY is required for answer generation');
    }
    const genAI = new GoogleGenerativeAI(options.apiKey);
    this.modelInstance = genAI.getGenerativeModel(
      {
        model: options.model,
        systemInstruction: SYSTEM_PROMPT,
        generationConfig: {
          temperature: options.temperature,
          maxOutputTokens: options.maxOutputTokens
        }
      },
      { timeout: options.timeoutMs }
    );
  }

  async generate(request: GenerationRequest): Promise<string> {
    try {
      const result = await withTimeout(
        this.modelInstance.generateContent(buildPrompt(request)),
        this.options.timeoutMs,
        () => new GenerationUnavailableError(`Generation exceeded ${this.options.timeoutMs}ms`)
      );
      const text = result.response.text();
      if (text.trim().length === 0) {
        throw new GenerationUnavailableError('Generation backend returned an empty answer');
      }
      return text;
    } catch (error) {
      if (error instanceof RagError) {
        throw error;
      }
      const err = error instanceof Error ? error : new Error(String(error));
      console.error(`[GenerationService] ERROR: LLM call failed:`, err.message);
      throw new GenerationUnavailableError(`Failed to generate answer: ${err.message}`, err);
    }
  }
}
