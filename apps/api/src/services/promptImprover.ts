import { z } from 'zod';
import {
  AppError,
  PromptImproverUnavailableError,
  ProviderCallError,
  ValidationError,
  modelNotFound
} from '../errors';
import { logInfo, logWarn } from '../logger';
import { findModelById, resolveCredential } from '../repositories/modelRepository';
import {
  SETTING_KEYS,
  getSetting,
  parseBooleanSetting,
  parseImproverModelId,
  readDispatchPolicy
} from '../repositories/settingsRepository';
import { buildChatPayload, extractCompletionText } from './chatCompletion';
import type { HttpTransport } from './httpTransport';
import { ProviderTimeoutError, raceAbort } from './providerCall';
import type { SecretResolver } from './secrets';

const MAX_ALTERNATIVES = 3;
const PLAIN_TEXT_LIMIT = 200;

export const ADAPTATION_KINDS = ['code', 'analysis', 'creative'] as const;
export type AdaptationKind = (typeof ADAPTATION_KINDS)[number];

export interface PromptImprovement {
  improved: string;
  alternatives: string[];
  adaptations: Partial<Record<AdaptationKind, string>>;
}

export interface ImprovedPrompt extends PromptImprovement {
  modelId: number;
  modelName: string;
}

export interface PromptImproverDeps {
  secrets: SecretResolver;
  transport: HttpTransport;
}

// Fields of the wrong shape are dropped rather than failing the whole reply.
const improvementSchema = z.object({
  improved: z.string().catch(''),
  alternatives: z.array(z.unknown()).catch([]),
  adaptations: z.record(z.unknown()).catch({})
});

const FENCED_JSON = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/i;

export function buildImprovementRequest(promptText: string): string {
  return [
    'You improve prompts for AI models. Rewrite the prompt below so it is clearer, more specific and more effective.',
    '',
    'Prompt:',
    promptText,
    '',
    'Answer with JSON only, in this shape:',
    '{"improved": "...", "alternatives": ["...", "...", "..."], "adaptations": {"code": "...", "analysis": "...", "creative": "..."}}',
    '',
    'If the prompt is already good, keep it close to the original but still give alternatives and adaptations.'
  ].join('\n');
}

function toImprovement(data: z.infer<typeof improvementSchema>): PromptImprovement {
  const alternatives = data.alternatives
    .map((item) => (typeof item === 'string' ? item.trim() : ''))
    .filter((item) => item !== '')
    .slice(0, MAX_ALTERNATIVES);

  const adaptations: Partial<Record<AdaptationKind, string>> = {};
  for (const kind of ADAPTATION_KINDS) {
    const value = data.adaptations[kind];
    if (typeof value === 'string' && value.trim()) {
      adaptations[kind] = value.trim();
    }
  }

  return { improved: data.improved.trim(), alternatives, adaptations };
}

function tryParseImprovement(candidate: string): PromptImprovement | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    return null;
  }
  const result = improvementSchema.safeParse(parsed);
  return result.success ? toImprovement(result.data) : null;
}

function clipPlainText(text: string): string {
  const codePoints = Array.from(text);
  return codePoints.length > PLAIN_TEXT_LIMIT ? `${codePoints.slice(0, PLAIN_TEXT_LIMIT).join('')}...` : text;
}

/**
 * Reads the model's answer: a fenced JSON block first, then the outermost
 * braces, and otherwise the plain text as the improved prompt.
 */
export function parseImprovement(text: string): PromptImprovement {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new ProviderCallError('Provider returned an empty response');
  }

  const fenced = FENCED_JSON.exec(trimmed);
  if (fenced) {
    const improvement = tryParseImprovement(fenced[1]);
    if (improvement) {
      return improvement;
    }
  }

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start >= 0 && end > start) {
    const improvement = tryParseImprovement(trimmed.slice(start, end + 1));
    if (improvement) {
      return improvement;
    }
  }

  return { improved: clipPlainText(trimmed), alternatives: [], adaptations: {} };
}

/** Asks the model chosen in settings for a better version of a prompt. */
export class PromptImprover {
  constructor(private readonly deps: PromptImproverDeps) {}

  async improve(promptText: string, options: { signal?: AbortSignal } = {}): Promise<ImprovedPrompt> {
    if (!promptText.trim()) {
      throw new ValidationError('Prompt text is required');
    }

    const enabled = parseBooleanSetting(
      SETTING_KEYS.improverEnabled,
      (await getSetting(SETTING_KEYS.improverEnabled)) ?? 'true'
    );
    if (!enabled) {
      throw new PromptImproverUnavailableError('PromptImproverDisabled', 'Prompt improvement is turned off');
    }

    const modelId = parseImproverModelId((await getSetting(SETTING_KEYS.improverModel)) ?? '');
    if (modelId === null) {
      throw new PromptImproverUnavailableError('PromptImproverModelNotSet', 'No model is set for prompt improvement');
    }
    const model = await findModelById(modelId);
    if (!model) {
      throw modelNotFound(modelId);
    }

    const { policy, issues } = await readDispatchPolicy();
    for (const issue of issues) {
      logWarn('Invalid setting ignored, using default', { key: issue.key, value: issue.value, error: issue.message });
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new ProviderTimeoutError(policy.timeoutMs)), policy.timeoutMs);
    const external = options.signal;
    const onExternalAbort = () => controller.abort(new Error('Prompt improvement was cancelled'));
    if (external?.aborted) {
      onExternalAbort();
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }

    try {
      const credential = await raceAbort(resolveCredential(model, this.deps.secrets), controller.signal);
      const body = await raceAbort(
        this.deps.transport.send({
          endpointUrl: model.apiUrl,
          payload: buildChatPayload(model, buildImprovementRequest(promptText)),
          credential,
          tlsVerify: policy.tlsVerify,
          signal: controller.signal
        }),
        controller.signal
      );
      const improvement = parseImprovement(extractCompletionText(body));
      logInfo('Prompt improved', { modelId: model.id, alternatives: improvement.alternatives.length });
      return { ...improvement, modelId: model.id, modelName: model.name };
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      const reason: unknown = controller.signal.aborted ? controller.signal.reason : error;
      throw new ProviderCallError(reason instanceof Error ? reason.message : String(reason), { cause: error });
    } finally {
      clearTimeout(timer);
      external?.removeEventListener('abort', onExternalAbort);
    }
  }
}
