import { Router } from 'express';
import { z } from 'zod';
import { ValidationError, resultNotFound } from '../errors';
import { logInfo } from '../logger';
import { getSetting, SETTING_KEYS } from '../repositories/settingsRepository';
import {
  deleteResult,
  findSelected,
  searchResults,
  toggleSelected,
  updateSelected
} from '../repositories/resultRepository';
import { exportSelectedResults, isExportFormat, serializeSelectedResult } from '../services/exportService';
import { parseBody, parseId, sendError, sendInvalidId } from './http';

const router = Router();

const updateSelectedSchema = z.object({
  selected: z.boolean()
});

router.get('/selected', async (_req, res) => {
  try {
    const results = await findSelected();
    res.json({ results: results.map(serializeSelectedResult) });
  } catch (error) {
    sendError(res, error, 'Unable to load selected results');
  }
});

router.get('/search', async (req, res) => {
  const query = typeof req.query.q === 'string' ? req.query.q.trim() : '';
  if (!query) {
    return res.status(400).json({ error: { code: 'ValidationError', message: 'Query parameter q is required' } });
  }

  try {
    const results = await searchResults(query);
    return res.json({ results: results.map(serializeSelectedResult) });
  } catch (error) {
    return sendError(res, error, 'Unable to search results');
  }
});

router.get('/export', async (req, res) => {
  try {
    const requested = typeof req.query.format === 'string' ? req.query.format : await getSetting(SETTING_KEYS.exportFormat);
    if (!isExportFormat(requested)) {
      throw new ValidationError('format must be markdown or json');
    }

    const document = await exportSelectedResults(requested);
    logInfo('Selected results exported', { format: requested });
    return res
      .status(200)
      .attachment(document.filename)
      .type(document.contentType)
      .send(document.body);
  } catch (error) {
    return sendError(res, error, 'Unable to export results');
  }
});

router.patch('/:resultId', async (req, res) => {
  const resultId = parseId(req.params.resultId);
  if (resultId === null) {
    return sendInvalidId(res);
  }

  try {
    const { selected } = parseBody(updateSelectedSchema, req.body);
    const result = await updateSelected(resultId, selected);
    return res.json({ result: { id: result.id, selected: result.selected } });
  } catch (error) {
    return sendError(res, error, 'Unable to update result', { resultId });
  }
});

router.post('/:resultId/toggle', async (req, res) => {
  const resultId = parseId(req.params.resultId);
  if (resultId === null) {
    return sendInvalidId(res);
  }

  try {
    const result = await toggleSelected(resultId);
    return res.json({ result: { id: result.id, selected: result.selected } });
  } catch (error) {
    return sendError(res, error, 'Unable to toggle result', { resultId });
  }
});

router.delete('/:resultId', async (req, res) => {
  const resultId = parseId(req.params.resultId);
  if (resultId === null) {
    return sendInvalidId(res);
  }

  try {
    const deleted = await deleteResult(resultId);
    if (!deleted) {
      throw resultNotFound(resultId);
    }
    logInfo('Result deleted', { resultId });
    return res.status(204).send();
  } catch (error) {
    return sendError(res, error, 'Unable to delete result', { resultId });
  }
});

export default router;
