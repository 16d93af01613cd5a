import { Router, type Response } from 'express';
import { z } from 'zod';
import { promptNotFound } from '../errors';
import { logInfo } from '../logger';
import {
  createPrompt,
  deletePrompt,
  findPromptById,
  listPrompts,
  searchPrompts
} from '../repositories/promptRepository';
import { findResults } from '../repositories/resultRepository';
import type { DispatchEngine } from '../services/dispatchEngine';
import type { PromptImprover } from '../services/promptImprover';
import { DispatchOutcome, FailureOutcome, Prompt, ResultWithModel, SuccessOutcome } from '../types';
import { parseBody, parseId, sendError, sendInvalidId } from './http';

interface PromptResponse {
  id: number;
  text: string;
  tags: string[];
  createdAt: string;
}

export interface ResultResponse {
  id: number;
  promptId: number;
  modelId: number;
  modelName: string;
  responseText: string;
  errorKind: string | null;
  selected: boolean;
  createdAt: string;
}

type OutcomeResponse = SuccessOutcome | Omit<FailureOutcome, 'cause'>;

const improvePromptSchema = z.object({
  text: z.string().trim().min(1, 'Prompt text is required')
});

const createPromptSchema = z.object({
  text: z.string().trim().min(1, 'Prompt text is required'),
  tags: z.array(z.string()).optional()
});

function serializePrompt(prompt: Prompt): PromptResponse {
  return {
    id: prompt.id,
    text: prompt.text,
    tags: prompt.tags,
    createdAt: prompt.createdAt.toISOString()
  };
}

export function serializeResult(result: ResultWithModel): ResultResponse {
  return {
    id: result.id,
    promptId: result.promptId,
    modelId: result.modelId,
    modelName: result.modelName,
    responseText: result.responseText,
    errorKind: result.errorKind,
    selected: result.selected,
    createdAt: result.createdAt.toISOString()
  };
}

// The underlying error object is for logs only.
function serializeOutcome(outcome: DispatchOutcome): OutcomeResponse {
  if (outcome.status === 'success') {
    return outcome;
  }
  const { cause: _cause, ...rest } = outcome;
  return rest;
}

function readQueryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

// A client that hangs up cancels the provider calls still in flight.
function abortOnDisconnect(res: Response) {
  const controller = new AbortController();
  const onClose = () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  };
  res.on('close', onClose);
  return { signal: controller.signal, release: () => res.off('close', onClose) };
}

export function createPromptsRouter(engine: DispatchEngine, improver: PromptImprover): Router {
  const router = Router();

  router.get('/', async (req, res) => {
    const query = readQueryString(req.query.q)?.trim();
    try {
      const prompts = query
        ? await searchPrompts(query)
        : await listPrompts({
            sortBy: readQueryString(req.query.sortBy),
            order: readQueryString(req.query.order)
          });
      res.json({ prompts: prompts.map(serializePrompt) });
    } catch (error) {
      sendError(res, error, 'Unable to load prompts');
    }
  });

  router.post('/', async (req, res) => {
    try {
      const body = parseBody(createPromptSchema, req.body);
      const prompt = await createPrompt({ text: body.text, tags: body.tags });
      logInfo('Prompt created', { promptId: prompt.id, tags: prompt.tags.length });
      res.status(201).json({ prompt: serializePrompt(prompt) });
    } catch (error) {
      sendError(res, error, 'Unable to create prompt');
    }
  });

  router.post('/improve', async (req, res) => {
    const disconnect = abortOnDisconnect(res);
    try {
      const { text } = parseBody(improvePromptSchema, req.body);
      const improvement = await improver.improve(text, { signal: disconnect.signal });
      res.json({ improvement });
    } catch (error) {
      sendError(res, error, 'Unable to improve prompt');
    } finally {
      disconnect.release();
    }
  });

  router.get('/:promptId', async (req, res) => {
    const promptId = parseId(req.params.promptId);
    if (promptId === null) {
      return sendInvalidId(res);
    }

    try {
      const prompt = await findPromptById(promptId);
      if (!prompt) {
        throw promptNotFound(promptId);
      }
      const results = await findResults(promptId);
      return res.json({ prompt: serializePrompt(prompt), results: results.map(serializeResult) });
    } catch (error) {
      return sendError(res, error, 'Unable to load prompt', { promptId });
    }
  });

  router.get('/:promptId/results', async (req, res) => {
    const promptId = parseId(req.params.promptId);
    if (promptId === null) {
      return sendInvalidId(res);
    }

    try {
      const prompt = await findPromptById(promptId);
      if (!prompt) {
        throw promptNotFound(promptId);
      }
      const results = await findResults(promptId);
      return res.json({ results: results.map(serializeResult) });
    } catch (error) {
      return sendError(res, error, 'Unable to load results', { promptId });
    }
  });

  router.post('/:promptId/dispatch', async (req, res) => {
    const promptId = parseId(req.params.promptId);
    if (promptId === null) {
      return sendInvalidId(res);
    }

    const disconnect = abortOnDisconnect(res);
    try {
      const outcomes = await engine.dispatch(promptId, { signal: disconnect.signal });
      return res.json({ outcomes: outcomes.map(serializeOutcome) });
    } catch (error) {
      return sendError(res, error, 'Unable to dispatch prompt', { promptId });
    } finally {
      disconnect.release();
    }
  });

  router.delete('/:promptId', async (req, res) => {
    const promptId = parseId(req.params.promptId);
    if (promptId === null) {
      return sendInvalidId(res);
    }

    try {
      const deleted = await deletePrompt(promptId);
      if (!deleted) {
        throw promptNotFound(promptId);
      }
      logInfo('Prompt deleted', { promptId });
      return res.status(204).send();
    } catch (error) {
      return sendError(res, error, 'Unable to delete prompt', { promptId });
    }
  });

  return router;
}
