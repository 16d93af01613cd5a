import { MissingCredentialError, promptNotFound } from '../errors';
import { logDebug, logError, logInfo, logWarn } from '../logger';
import { listActiveModels, resolveCredential } from '../repositories/modelRepository';
import { findPromptById } from '../repositories/promptRepository';
import { createResult } from '../repositories/resultRepository';
import { DispatchPolicy, readDispatchPolicy } from '../repositories/settingsRepository';
import { DispatchErrorKind, DispatchOutcome, Model, Prompt } from '../types';
import { buildChatPayload, extractCompletionText, truncateResponse } from './chatCompletion';
import type { HttpTransport } from './httpTransport';
import { ProviderTimeoutError, raceAbort } from './providerCall';
import type { SecretResolver } from './secrets';

export interface DispatchEngineDeps {
  secrets: SecretResolver;
  transport: HttpTransport;
}

export interface DispatchOptions {
  /** Aborting cancels every call still in flight. Results already stored are kept. */
  signal?: AbortSignal;
  /** Called once per model, after that model's outcome has been stored (or failed to store). */
  onOutcome?: (outcome: DispatchOutcome) => void;
}

class DispatchCancelledError extends Error {
  constructor() {
    super('Dispatch was cancelled before the provider answered');
    this.name = 'DispatchCancelledError';
  }
}

function classifyFailure(
  error: unknown,
  signal: AbortSignal
): { errorKind: DispatchErrorKind; errorMessage: string; cause?: unknown } {
  if (error instanceof MissingCredentialError) {
    return { errorKind: 'MissingCredential', errorMessage: error.message };
  }

  if (signal.aborted) {
    const reason: unknown = signal.reason;
    if (reason instanceof ProviderTimeoutError) {
      return { errorKind: 'Timeout', errorMessage: reason.message };
    }
    return { errorKind: 'Cancelled', errorMessage: new DispatchCancelledError().message };
  }

  return {
    errorKind: 'NetworkError',
    errorMessage: error instanceof Error ? error.message : String(error),
    cause: error
  };
}

/**
 * Sends a stored prompt to every active model at once and stores one result
 * per model as soon as that model's call settles. One model failing, timing
 * out or failing to store never affects the others.
 */
export class DispatchEngine {
  constructor(private readonly deps: DispatchEngineDeps) {}

  async dispatch(promptId: number, options: DispatchOptions = {}): Promise<DispatchOutcome[]> {
    const prompt = await findPromptById(promptId);
    if (!prompt) {
      throw promptNotFound(promptId);
    }

    const models = await listActiveModels();
    if (models.length === 0) {
      logInfo('Dispatch skipped: no active models', { promptId });
      return [];
    }

    const { policy, issues } = await readDispatchPolicy();
    for (const issue of issues) {
      logWarn('Invalid setting ignored, using default', {
        key: issue.key,
        value: issue.value,
        error: issue.message
      });
    }

    logInfo('Dispatch started', {
      promptId,
      models: models.length,
      timeoutMs: policy.timeoutMs,
      tlsVerify: policy.tlsVerify
    });

    const outcomes = await Promise.all(
      models.map((model) => this.dispatchToModel(prompt, model, policy, options))
    );

    logInfo('Dispatch finished', {
      promptId,
      succeeded: outcomes.filter((outcome) => outcome.status === 'success').length,
      failed: outcomes.filter((outcome) => outcome.status === 'failure').length
    });

    return outcomes;
  }

  private async dispatchToModel(
    prompt: Prompt,
    model: Model,
    policy: DispatchPolicy,
    options: DispatchOptions
  ): Promise<DispatchOutcome> {
    const outcome = await this.callModel(prompt, model, policy, options.signal);
    const stored = await this.persistOutcome(prompt.id, outcome);

    if (options.onOutcome) {
      try {
        options.onOutcome(stored);
      } catch (error) {
        logError('Dispatch outcome listener threw', { promptId: prompt.id, modelId: model.id, error });
      }
    }

    return stored;
  }

  // The deadline starts with the task and covers credential lookup as well as the request.
  private async callModel(
    prompt: Prompt,
    model: Model,
    policy: DispatchPolicy,
    external?: AbortSignal
  ): Promise<DispatchOutcome> {
    const startedAt = Date.now();
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new ProviderTimeoutError(policy.timeoutMs)), policy.timeoutMs);
    const onExternalAbort = () => controller.abort(new DispatchCancelledError());
    if (external?.aborted) {
      onExternalAbort();
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }

    const base = {
      modelId: model.id,
      modelName: model.name,
      resultId: null,
      persistError: null
    };

    try {
      const credential = await raceAbort(resolveCredential(model, this.deps.secrets), controller.signal);
      logDebug('Sending prompt to model', { promptId: prompt.id, modelId: model.id, endpoint: model.apiUrl });
      const body = await raceAbort(
        this.deps.transport.send({
          endpointUrl: model.apiUrl,
          payload: buildChatPayload(model, prompt.text),
          credential,
          tlsVerify: policy.tlsVerify,
          signal: controller.signal
        }),
        controller.signal
      );
      const { text, truncated } = truncateResponse(extractCompletionText(body), policy.maxResponseLength);

      logInfo('Model answered', { promptId: prompt.id, modelId: model.id, truncated });
      return {
        ...base,
        status: 'success',
        responseText: text,
        truncated,
        elapsedMs: Date.now() - startedAt
      };
    } catch (error) {
      const failure = classifyFailure(error, controller.signal);
      logWarn('Model call failed', {
        promptId: prompt.id,
        modelId: model.id,
        errorKind: failure.errorKind,
        error: failure.cause ?? failure.errorMessage
      });
      return {
        ...base,
        status: 'failure',
        ...failure,
        elapsedMs: Date.now() - startedAt
      };
    } finally {
      clearTimeout(timer);
      external?.removeEventListener('abort', onExternalAbort);
    }
  }

  private async persistOutcome(promptId: number, outcome: DispatchOutcome): Promise<DispatchOutcome> {
    // A cancelled call never completed, so there is nothing to record.
    if (outcome.status === 'failure' && outcome.errorKind === 'Cancelled') {
      return outcome;
    }

    try {
      const result = await createResult({
        promptId,
        modelId: outcome.modelId,
        responseText: outcome.status === 'success' ? outcome.responseText : outcome.errorMessage,
        errorKind: outcome.status === 'success' ? null : outcome.errorKind
      });
      return { ...outcome, resultId: result.id };
    } catch (error) {
      logError('Failed to store dispatch outcome', { promptId, modelId: outcome.modelId, error });
      return { ...outcome, persistError: error instanceof Error ? error.message : String(error) };
    }
  }
}
