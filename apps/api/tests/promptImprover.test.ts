import assert from 'node:assert/strict';
import { after, beforeEach, describe, test } from 'node:test';
import { db } from '../src/db';
import {
  MissingCredentialError,
  NotFoundError,
  PromptImproverUnavailableError,
  ProviderCallError,
  ValidationError
} from '../src/errors';
import { createModel } from '../src/repositories/modelRepository';
import { setSetting } from '../src/repositories/settingsRepository';
import { HttpStatusError } from '../src/services/httpTransport';
import { PromptImprover, buildImprovementRequest, parseImprovement } from '../src/services/promptImprover';
import { createStaticSecretResolver } from '../src/services/secrets';
import { FakeTransport, abortableDelay, completion, resetDatabase } from './helpers';

const EDITOR_URL = 'https://editor.llm.test/v1/chat/completions';
const secrets = createStaticSecretResolver({ EDITOR_KEY: 'test-secret' });

beforeEach(resetDatabase);
after(async () => {
  await db.destroy();
});

async function useEditorModel(credentialKey = 'EDITOR_KEY') {
  const model = await createModel({
    name: 'editor',
    apiUrl: EDITOR_URL,
    credentialKey,
    modelName: 'editor-large'
  });
  await setSetting('prompt_improver_model', String(model.id));
  return model;
}

describe('improvement parsing', () => {
  test('reads a fenced JSON block', () => {
    const reply = [
      'Here you go:',
      '```json',
      '{"improved": " List three rivers in Europe. ", "alternatives": ["Name European rivers.", "", 4], "adaptations": {"code": "Return rivers as JSON.", "poetry": "ignored"}}',
      '```'
    ].join('\n');

    assert.deepEqual(parseImprovement(reply), {
      improved: 'List three rivers in Europe.',
      alternatives: ['Name European rivers.'],
      adaptations: { code: 'Return rivers as JSON.' }
    });
  });

  test('reads bare JSON surrounded by prose and keeps at most three alternatives', () => {
    const reply = 'Sure! {"improved": "Be specific.", "alternatives": ["a", "b", "c", "d"]} Hope it helps.';

    assert.deepEqual(parseImprovement(reply), {
      improved: 'Be specific.',
      alternatives: ['a', 'b', 'c'],
      adaptations: {}
    });
  });

  test('drops fields of the wrong shape', () => {
    assert.deepEqual(parseImprovement('{"improved": 7, "alternatives": "one", "adaptations": ["x"]}'), {
      improved: '',
      alternatives: [],
      adaptations: {}
    });
  });

  test('falls back to the plain text when there is no JSON', () => {
    assert.deepEqual(parseImprovement('  Ask for three rivers and their lengths.  '), {
      improved: 'Ask for three rivers and their lengths.',
      alternatives: [],
      adaptations: {}
    });
    assert.equal(parseImprovement('x'.repeat(250)).improved, `${'x'.repeat(200)}...`);
  });

  test('rejects an empty reply', () => {
    assert.throws(() => parseImprovement('   '), ProviderCallError);
  });
});

describe('prompt improver', () => {
  test('sends the instructions to the configured model', async () => {
    const model = await useEditorModel();
    await setSetting('verify_tls', 'false');
    const transport = new FakeTransport().on(EDITOR_URL, async () =>
      completion('{"improved": "Name three long rivers.", "alternatives": ["Which rivers are longest?"]}')
    );

    const result = await new PromptImprover({ secrets, transport }).improve('rivers?');

    assert.deepEqual(result, {
      improved: 'Name three long rivers.',
      alternatives: ['Which rivers are longest?'],
      adaptations: {},
      modelId: model.id,
      modelName: 'editor'
    });
    assert.equal(transport.requests.length, 1);
    const [request] = transport.requests;
    assert.equal(request.credential, 'test-secret');
    assert.equal(request.tlsVerify, false);
    assert.deepEqual(request.payload, {
      model: 'editor-large',
      messages: [{ role: 'user', content: buildImprovementRequest('rivers?') }],
      temperature: 0.7
    });
    assert.match(buildImprovementRequest('rivers?'), /\nPrompt:\nrivers\?\n/);
  });

  test('refuses while turned off', async () => {
    await useEditorModel();
    await setSetting('prompt_improver_enabled', 'false');
    const transport = new FakeTransport();

    await assert.rejects(
      new PromptImprover({ secrets, transport }).improve('rivers?'),
      (error: unknown) => error instanceof PromptImproverUnavailableError && error.code === 'PromptImproverDisabled'
    );
    assert.equal(transport.requests.length, 0);
  });

  test('refuses until a model is picked', async () => {
    await assert.rejects(
      new PromptImprover({ secrets, transport: new FakeTransport() }).improve('rivers?'),
      (error: unknown) => error instanceof PromptImproverUnavailableError && error.code === 'PromptImproverModelNotSet'
    );
  });

  test('reports a picked model that no longer exists', async () => {
    await setSetting('prompt_improver_model', '404');
    await assert.rejects(
      new PromptImprover({ secrets, transport: new FakeTransport() }).improve('rivers?'),
      (error: unknown) => error instanceof NotFoundError && error.code === 'ModelNotFound'
    );
  });

  test('rejects blank prompts and missing credentials before calling out', async () => {
    await useEditorModel('UNSET_KEY');
    const transport = new FakeTransport();
    const improver = new PromptImprover({ secrets, transport });

    await assert.rejects(improver.improve('  '), ValidationError);
    await assert.rejects(improver.improve('rivers?'), MissingCredentialError);
    assert.equal(transport.requests.length, 0);
  });

  test('wraps provider failures', async () => {
    await useEditorModel();
    const transport = new FakeTransport().on(EDITOR_URL, async () => {
      throw new HttpStatusError(500, 'boom');
    });

    await assert.rejects(new PromptImprover({ secrets, transport }).improve('rivers?'), (error: unknown) => {
      assert(error instanceof ProviderCallError);
      assert.equal(error.statusCode, 502);
      assert.equal(error.message, 'Provider responded with HTTP 500: boom');
      assert(error.cause instanceof HttpStatusError);
      return true;
    });
  });

  test('gives up after the configured timeout', async () => {
    await useEditorModel();
    await setSetting('default_timeout', '0.05');
    const transport = new FakeTransport().on(EDITOR_URL, async (request) => {
      await abortableDelay(5000, request.signal);
      return completion('too late');
    });

    await assert.rejects(
      new PromptImprover({ secrets, transport }).improve('rivers?'),
      (error: unknown) => error instanceof ProviderCallError && error.message === 'Request timed out after 0.05s'
    );
  });
});
