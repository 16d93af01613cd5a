import { db } from '../db';
import { isForeignKeyViolation, modelNotFound, promptNotFound, resultNotFound } from '../errors';
import {
  DISPATCH_ERROR_KINDS,
  DispatchErrorKind,
  ModelRow,
  PromptRow,
  Result,
  ResultRow,
  ResultWithModel,
  SelectedResult
} from '../types';
import { escapeLikePattern } from './promptRepository';

interface CreateResultParams {
  promptId: number;
  modelId: number;
  responseText: string;
  errorKind?: DispatchErrorKind | null;
  selected?: boolean;
  createdAt?: Date;
}

interface ResultWithModelRow extends ResultRow {
  model_name: string;
}

interface SelectedResultRow extends ResultWithModelRow {
  prompt_text: string;
}

function toErrorKind(value: string | null): DispatchErrorKind | null {
  return DISPATCH_ERROR_KINDS.find((kind) => kind === value) ?? null;
}

export function toResult(row: ResultRow): Result {
  return {
    id: row.id,
    promptId: row.prompt_id,
    modelId: row.model_id,
    responseText: row.response,
    createdAt: new Date(row.date),
    selected: Boolean(row.selected),
    errorKind: toErrorKind(row.error_kind)
  };
}

function toResultWithModel(row: ResultWithModelRow): ResultWithModel {
  return { ...toResult(row), modelName: row.model_name };
}

function toSelectedResult(row: SelectedResultRow): SelectedResult {
  return { ...toResultWithModel(row), promptText: row.prompt_text };
}

/**
 * Inserts one result. The prompt and model are checked inside the same
 * transaction as the insert, so a write that loses a race with
 * deletePrompt is rejected with PromptNotFound rather than orphaned.
 */
export async function createResult(params: CreateResultParams): Promise<Result> {
  try {
    return await db.transaction(async (trx) => {
      const prompt = await trx<PromptRow>('prompts').where({ id: params.promptId }).first('id');
      if (!prompt) {
        throw promptNotFound(params.promptId);
      }
      const model = await trx<ModelRow>('models').where({ id: params.modelId }).first('id');
      if (!model) {
        throw modelNotFound(params.modelId);
      }

      const [row] = await trx<ResultRow>('results')
        .insert({
          prompt_id: params.promptId,
          model_id: params.modelId,
          response: params.responseText,
          date: (params.createdAt ?? new Date()).toISOString(),
          selected: params.selected ? 1 : 0,
          error_kind: params.errorKind ?? null
        })
        .returning('*');
      return toResult(row);
    });
  } catch (error) {
    if (!isForeignKeyViolation(error)) {
      throw error;
    }
    const prompt = await db<PromptRow>('prompts').where({ id: params.promptId }).first('id');
    throw prompt ? modelNotFound(params.modelId) : promptNotFound(params.promptId);
  }
}

export async function findResultById(resultId: number): Promise<Result | undefined> {
  const row = await db<ResultRow>('results').where({ id: resultId }).first();
  return row ? toResult(row) : undefined;
}

/** Results for one prompt in arrival order. */
export async function findResults(promptId: number): Promise<ResultWithModel[]> {
  const rows = await db('results as r')
    .join('models as m', 'm.id', 'r.model_id')
    .where('r.prompt_id', promptId)
    .select<ResultWithModelRow[]>('r.*', 'm.name as model_name')
    .orderBy([
      { column: 'r.date', order: 'asc' },
      { column: 'r.id', order: 'asc' }
    ]);
  return rows.map(toResultWithModel);
}

/** Every selected result across prompts, newest first. */
export async function findSelected(): Promise<SelectedResult[]> {
  const rows = await db('results as r')
    .join('models as m', 'm.id', 'r.model_id')
    .join('prompts as p', 'p.id', 'r.prompt_id')
    .where('r.selected', 1)
    .select<SelectedResultRow[]>('r.*', 'm.name as model_name', 'p.prompt as prompt_text')
    .orderBy([
      { column: 'r.date', order: 'desc' },
      { column: 'r.id', order: 'desc' }
    ]);
  return rows.map(toSelectedResult);
}

export async function searchResults(query: string): Promise<SelectedResult[]> {
  const rows = await db('results as r')
    .join('models as m', 'm.id', 'r.model_id')
    .join('prompts as p', 'p.id', 'r.prompt_id')
    .whereRaw("r.response like ? escape '\\'", [escapeLikePattern(query)])
    .select<SelectedResultRow[]>('r.*', 'm.name as model_name', 'p.prompt as prompt_text')
    .orderBy([
      { column: 'r.date', order: 'desc' },
      { column: 'r.id', order: 'desc' }
    ]);
  return rows.map(toSelectedResult);
}

export async function updateSelected(resultId: number, selected: boolean): Promise<Result> {
  const updated = await db<ResultRow>('results')
    .where({ id: resultId })
    .update({ selected: selected ? 1 : 0 });
  if (updated === 0) {
    throw resultNotFound(resultId);
  }
  const result = await findResultById(resultId);
  if (!result) {
    throw resultNotFound(resultId);
  }
  return result;
}

/** Flips the flag in one statement, so concurrent toggles never collapse into one. */
export async function toggleSelected(resultId: number): Promise<Result> {
  const updated = await db<ResultRow>('results')
    .where({ id: resultId })
    .update({ selected: db.raw('1 - selected') });
  if (updated === 0) {
    throw resultNotFound(resultId);
  }
  const result = await findResultById(resultId);
  if (!result) {
    throw resultNotFound(resultId);
  }
  return result;
}

export async function deleteResult(resultId: number): Promise<boolean> {
  const deleted = await db<ResultRow>('results').where({ id: resultId }).del();
  return deleted > 0;
}
