import { Router } from 'express';
import { z } from 'zod';
import { logInfo } from '../logger';
import { getSetting, listSettings, setSetting, validateSetting } from '../repositories/settingsRepository';
import { parseBody, sendError } from './http';

const router = Router();

const updateSettingSchema = z.object({
  value: z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value))
});

router.get('/', async (_req, res) => {
  try {
    const settings = await listSettings();
    res.json({ settings });
  } catch (error) {
    sendError(res, error, 'Unable to load settings');
  }
});

router.get('/:key', async (req, res) => {
  const { key } = req.params;
  try {
    const value = await getSetting(key);
    if (value === null) {
      return res.status(404).json({ error: { code: 'SettingNotFound', message: `Setting ${key} is not set` } });
    }
    return res.json({ key, value });
  } catch (error) {
    return sendError(res, error, 'Unable to load setting', { key });
  }
});

router.put('/:key', async (req, res) => {
  const { key } = req.params;
  try {
    const { value } = parseBody(updateSettingSchema, req.body);
    validateSetting(key, value);
    await setSetting(key, value);
    logInfo('Setting updated', { key });
    return res.json({ key, value });
  } catch (error) {
    return sendError(res, error, 'Unable to update setting', { key });
  }
});

export default router;
