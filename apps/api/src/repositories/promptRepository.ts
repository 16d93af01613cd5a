import { db } from '../db';
import { ValidationError } from '../errors';
import { Prompt, PromptRow, ResultRow } from '../types';

export type PromptSortField = 'id' | 'date' | 'prompt';
export type SortOrder = 'asc' | 'desc';

interface CreatePromptParams {
  text: string;
  tags?: readonly string[];
  createdAt?: Date;
}

interface ListPromptsOptions {
  sortBy?: string;
  order?: string;
}

const SORT_FIELDS: readonly PromptSortField[] = ['id', 'date', 'prompt'];

/** Trims, drops empties and duplicates, and splits on commas since tags are stored comma-joined. */
export function normalizeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const normalized: string[] = [];
  for (const raw of tags) {
    for (const part of raw.split(',')) {
      const tag = part.trim();
      if (tag && !seen.has(tag)) {
        seen.add(tag);
        normalized.push(tag);
      }
    }
  }
  return normalized;
}

export function toPrompt(row: PromptRow): Prompt {
  return {
    id: row.id,
    createdAt: new Date(row.date),
    text: row.prompt,
    tags: row.tags ? normalizeTags([row.tags]) : []
  };
}

export function escapeLikePattern(query: string): string {
  return `%${query.replace(/[\\%_]/g, (match) => `\\${match}`)}%`;
}

export async function createPrompt(params: CreatePromptParams): Promise<Prompt> {
  if (!params.text.trim()) {
    throw new ValidationError('Prompt text is required');
  }

  const tags = normalizeTags(params.tags ?? []);
  const [row] = await db<PromptRow>('prompts')
    .insert({
      date: (params.createdAt ?? new Date()).toISOString(),
      prompt: params.text,
      tags: tags.length > 0 ? tags.join(',') : null
    })
    .returning('*');

  return toPrompt(row);
}

export async function findPromptById(promptId: number): Promise<Prompt | undefined> {
  const row = await db<PromptRow>('prompts').where({ id: promptId }).first();
  return row ? toPrompt(row) : undefined;
}

export async function listPrompts(options: ListPromptsOptions = {}): Promise<Prompt[]> {
  const sortBy = SORT_FIELDS.find((field) => field === options.sortBy) ?? 'date';
  const order: SortOrder = options.order?.toLowerCase() === 'asc' ? 'asc' : 'desc';
  const rows = await db<PromptRow>('prompts').orderBy([
    { column: sortBy, order },
    { column: 'id', order }
  ]);
  return rows.map(toPrompt);
}

export async function searchPrompts(query: string): Promise<Prompt[]> {
  const pattern = escapeLikePattern(query);
  const rows = await db<PromptRow>('prompts')
    .whereRaw("prompt like ? escape '\\'", [pattern])
    .orWhereRaw("tags like ? escape '\\'", [pattern])
    .orderBy([
      { column: 'date', order: 'desc' },
      { column: 'id', order: 'desc' }
    ]);
  return rows.map(toPrompt);
}

/**
 * Removes the prompt and every result that references it as one unit.
 * A result insert racing with this delete either lands before it (and is
 * removed here) or finds the prompt gone and is rejected.
 */
export async function deletePrompt(promptId: number): Promise<boolean> {
  return db.transaction(async (trx) => {
    await trx<ResultRow>('results').where({ prompt_id: promptId }).del();
    const deleted = await trx<PromptRow>('prompts').where({ id: promptId }).del();
    return deleted > 0;
  });
}
