import { Router } from 'express';
import { z } from 'zod';
import { modelNotFound } from '../errors';
import { logInfo } from '../logger';
import {
  createModel,
  deleteModel,
  findModelById,
  listModels,
  setModelActive,
  toggleModelActive,
  updateModel
} from '../repositories/modelRepository';
import { parseBody, parseId, sendError, sendInvalidId } from './http';

const router = Router();

const createModelSchema = z.object({
  name: z.string().trim().min(1, 'Model name is required'),
  apiUrl: z.string().trim().url('API URL must be a valid URL'),
  credentialKey: z.string().trim().min(1, 'Credential key is required'),
  modelName: z.string().nullable().optional(),
  isActive: z.boolean().optional()
});

const updateModelSchema = z.object({
  name: z.string().optional(),
  apiUrl: z.string().optional(),
  credentialKey: z.string().optional(),
  modelName: z.string().nullable().optional(),
  isActive: z.boolean().optional()
});

router.get('/', async (_req, res) => {
  try {
    const models = await listModels();
    res.json({ models });
  } catch (error) {
    sendError(res, error, 'Unable to load models');
  }
});

router.post('/', async (req, res) => {
  try {
    const body = parseBody(createModelSchema, req.body);
    const model = await createModel(body);
    logInfo('Model created', { modelId: model.id, name: model.name });
    res.status(201).json({ model });
  } catch (error) {
    sendError(res, error, 'Unable to create model');
  }
});

router.get('/:modelId', async (req, res) => {
  const modelId = parseId(req.params.modelId);
  if (modelId === null) {
    return sendInvalidId(res);
  }

  try {
    const model = await findModelById(modelId);
    if (!model) {
      throw modelNotFound(modelId);
    }
    return res.json({ model });
  } catch (error) {
    return sendError(res, error, 'Unable to load model', { modelId });
  }
});

router.put('/:modelId', async (req, res) => {
  const modelId = parseId(req.params.modelId);
  if (modelId === null) {
    return sendInvalidId(res);
  }

  try {
    const { isActive, ...changes } = parseBody(updateModelSchema, req.body);
    let model = await updateModel(modelId, changes);
    if (isActive !== undefined && isActive !== model.isActive) {
      model = await setModelActive(modelId, isActive);
    }
    logInfo('Model updated', { modelId });
    return res.json({ model });
  } catch (error) {
    return sendError(res, error, 'Unable to update model', { modelId });
  }
});

router.post('/:modelId/toggle', async (req, res) => {
  const modelId = parseId(req.params.modelId);
  if (modelId === null) {
    return sendInvalidId(res);
  }

  try {
    const model = await toggleModelActive(modelId);
    logInfo('Model toggled', { modelId, isActive: model.isActive });
    return res.json({ model });
  } catch (error) {
    return sendError(res, error, 'Unable to toggle model', { modelId });
  }
});

router.delete('/:modelId', async (req, res) => {
  const modelId = parseId(req.params.modelId);
  if (modelId === null) {
    return sendInvalidId(res);
  }

  try {
    await deleteModel(modelId);
    logInfo('Model deleted', { modelId });
    return res.status(204).send();
  } catch (error) {
    return sendError(res, error, 'Unable to delete model', { modelId });
  }
});

export default router;
