import { db } from '../db';
import {
  MissingCredentialError,
  ModelNameTakenError,
  ProviderInUseError,
  ValidationError,
  isUniqueViolation,
  modelNotFound
} from '../errors';
import type { SecretResolver } from '../services/secrets';
import { Model, ModelRow, ResultRow } from '../types';

export interface CreateModelParams {
  name: string;
  apiUrl: string;
  credentialKey: string;
  modelName?: string | null;
  isActive?: boolean;
}

export type UpdateModelParams = Partial<Omit<CreateModelParams, 'isActive'>>;

export function toModel(row: ModelRow): Model {
  return {
    id: row.id,
    name: row.name,
    apiUrl: row.api_url,
    credentialKey: row.api_id,
    modelName: row.model_name,
    isActive: Boolean(row.is_active)
  };
}

function requireText(value: string, field: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ValidationError(`${field} is required`);
  }
  return trimmed;
}

function normalizeApiUrl(value: string): string {
  const trimmed = requireText(value, 'API URL');
  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    throw new ValidationError(`API URL "${trimmed}" is not a valid URL`);
  }
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new ValidationError('API URL must use http or https');
  }
  return trimmed;
}

function optionalText(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export async function listModels(): Promise<Model[]> {
  const rows = await db<ModelRow>('models').orderBy([
    { column: 'name', order: 'asc' },
    { column: 'id', order: 'asc' }
  ]);
  return rows.map(toModel);
}

/** Dispatch targets, in insertion order. */
export async function listActiveModels(): Promise<Model[]> {
  const rows = await db<ModelRow>('models').where({ is_active: 1 }).orderBy('id', 'asc');
  return rows.map(toModel);
}

export async function findModelById(modelId: number): Promise<Model | undefined> {
  const row = await db<ModelRow>('models').where({ id: modelId }).first();
  return row ? toModel(row) : undefined;
}

export async function createModel(params: CreateModelParams): Promise<Model> {
  const name = requireText(params.name, 'Model name');
  const insert = {
    name,
    api_url: normalizeApiUrl(params.apiUrl),
    api_id: requireText(params.credentialKey, 'Credential key'),
    model_name: optionalText(params.modelName),
    is_active: params.isActive === false ? 0 : 1
  };

  try {
    const [row] = await db<ModelRow>('models').insert(insert).returning('*');
    return toModel(row);
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new ModelNameTakenError(name);
    }
    throw error;
  }
}

export async function updateModel(modelId: number, changes: UpdateModelParams): Promise<Model> {
  const update: Partial<ModelRow> = {};
  if (changes.name !== undefined) {
    update.name = requireText(changes.name, 'Model name');
  }
  if (changes.apiUrl !== undefined) {
    update.api_url = normalizeApiUrl(changes.apiUrl);
  }
  if (changes.credentialKey !== undefined) {
    update.api_id = requireText(changes.credentialKey, 'Credential key');
  }
  if (changes.modelName !== undefined) {
    update.model_name = optionalText(changes.modelName);
  }

  if (Object.keys(update).length > 0) {
    try {
      const updated = await db<ModelRow>('models').where({ id: modelId }).update(update);
      if (updated === 0) {
        throw modelNotFound(modelId);
      }
    } catch (error) {
      if (update.name && isUniqueViolation(error)) {
        throw new ModelNameTakenError(update.name);
      }
      throw error;
    }
  }

  const model = await findModelById(modelId);
  if (!model) {
    throw modelNotFound(modelId);
  }
  return model;
}

export async function setModelActive(modelId: number, isActive: boolean): Promise<Model> {
  const updated = await db<ModelRow>('models')
    .where({ id: modelId })
    .update({ is_active: isActive ? 1 : 0 });
  if (updated === 0) {
    throw modelNotFound(modelId);
  }
  const model = await findModelById(modelId);
  if (!model) {
    throw modelNotFound(modelId);
  }
  return model;
}

export async function toggleModelActive(modelId: number): Promise<Model> {
  const current = await findModelById(modelId);
  if (!current) {
    throw modelNotFound(modelId);
  }
  return setModelActive(modelId, !current.isActive);
}

/** Refuses with ProviderInUseError while any stored result references the model. */
export async function deleteModel(modelId: number): Promise<void> {
  await db.transaction(async (trx) => {
    const model = await trx<ModelRow>('models').where({ id: modelId }).first('id');
    if (!model) {
      throw modelNotFound(modelId);
    }

    const references = await trx<ResultRow>('results').where({ model_id: modelId }).select('id');
    if (references.length > 0) {
      throw new ProviderInUseError(modelId, references.length);
    }

    await trx<ModelRow>('models').where({ id: modelId }).del();
  });
}

export async function resolveCredential(model: Model, secrets: SecretResolver): Promise<string> {
  const secret = await secrets.resolve(model.credentialKey);
  if (secret === undefined || !secret.trim()) {
    throw new MissingCredentialError(model.credentialKey);
  }
  return secret.trim();
}
