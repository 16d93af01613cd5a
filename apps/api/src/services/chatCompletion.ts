import { z } from 'zod';
import { Model } from '../types';

const DEFAULT_TEMPERATURE = 0.7;

export interface ChatPayload {
  model: string;
  messages: Array<{ role: 'user'; content: string }>;
  temperature: number;
}

const choicesResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional()
        })
      })
    )
    .min(1)
});

const contentResponseSchema = z.object({
  content: z.string()
});

export class InvalidCompletionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCompletionError';
  }
}

/** Every provider speaks the OpenAI chat-completions shape; only the model identifier varies. */
export function buildChatPayload(model: Pick<Model, 'name' | 'modelName'>, promptText: string): ChatPayload {
  return {
    model: model.modelName?.trim() || model.name,
    messages: [{ role: 'user', content: promptText }],
    temperature: DEFAULT_TEMPERATURE
  };
}

export function extractCompletionText(body: unknown): string {
  const choices = choicesResponseSchema.safeParse(body);
  if (choices.success) {
    return choices.data.choices[0].message.content ?? '';
  }

  const content = contentResponseSchema.safeParse(body);
  if (content.success) {
    return content.data.content;
  }

  throw new InvalidCompletionError('Provider response did not contain a completion message');
}

/** Truncates by code point so surrogate pairs are never split. */
export function truncateResponse(text: string, maxLength: number): { text: string; truncated: boolean } {
  const codePoints = Array.from(text);
  if (codePoints.length <= maxLength) {
    return { text, truncated: false };
  }
  return { text: codePoints.slice(0, maxLength).join(''), truncated: true };
}
