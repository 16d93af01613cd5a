import assert from 'node:assert/strict';
import { after, beforeEach, describe, test } from 'node:test';
import { db } from '../src/db';
import {
  MissingCredentialError,
  ModelNameTakenError,
  NotFoundError,
  ProviderInUseError,
  ValidationError
} from '../src/errors';
import {
  createModel,
  deleteModel,
  findModelById,
  listActiveModels,
  listModels,
  resolveCredential,
  setModelActive,
  toggleModelActive,
  updateModel
} from '../src/repositories/modelRepository';
import { createPrompt } from '../src/repositories/promptRepository';
import { createResult, findResults } from '../src/repositories/resultRepository';
import { createStaticSecretResolver } from '../src/services/secrets';
import { resetDatabase } from './helpers';

beforeEach(resetDatabase);
after(async () => {
  await db.destroy();
});

function modelParams(name: string) {
  return {
    name,
    apiUrl: `https://${name}.llm.test/v1/chat/completions`,
    credentialKey: `${name.toUpperCase()}_KEY`
  };
}

describe('model registry', () => {
  test('creates models and lists active ones in insertion order', async () => {
    const zeta = await createModel(modelParams('zeta'));
    const alpha = await createModel({ ...modelParams('alpha'), modelName: ' gpt-test ' });
    const idle = await createModel({ ...modelParams('idle'), isActive: false });

    assert.equal(alpha.modelName, 'gpt-test');
    assert.equal(zeta.modelName, null);
    assert.equal(idle.isActive, false);

    const active = await listActiveModels();
    assert.deepEqual(
      active.map((model) => model.id),
      [zeta.id, alpha.id]
    );

    const all = await listModels();
    assert.deepEqual(
      all.map((model) => model.name),
      ['alpha', 'idle', 'zeta']
    );
  });

  test('rejects duplicate names and invalid input', async () => {
    await createModel(modelParams('shared'));
    await assert.rejects(createModel(modelParams('shared')), ModelNameTakenError);
    await assert.rejects(createModel({ ...modelParams('bad'), apiUrl: 'not a url' }), ValidationError);
    await assert.rejects(createModel({ ...modelParams('ftp'), apiUrl: 'ftp://llm.test/' }), ValidationError);
    await assert.rejects(createModel({ ...modelParams('blank'), credentialKey: ' ' }), ValidationError);
  });

  test('updates fields and keeps names unique', async () => {
    const first = await createModel(modelParams('first'));
    await createModel(modelParams('second'));

    const updated = await updateModel(first.id, {
      apiUrl: 'https://proxy.llm.test/v1/chat/completions',
      modelName: 'mini'
    });
    assert.equal(updated.apiUrl, 'https://proxy.llm.test/v1/chat/completions');
    assert.equal(updated.modelName, 'mini');
    assert.equal(updated.name, 'first');

    await assert.rejects(updateModel(first.id, { name: 'second' }), ModelNameTakenError);
    await assert.rejects(updateModel(9999, { name: 'ghost' }), NotFoundError);
  });

  test('toggles activity back and forth', async () => {
    const model = await createModel(modelParams('flip'));
    assert.equal((await toggleModelActive(model.id)).isActive, false);
    assert.equal((await listActiveModels()).length, 0);
    assert.equal((await toggleModelActive(model.id)).isActive, true);
    assert.equal((await setModelActive(model.id, true)).isActive, true);
    await assert.rejects(toggleModelActive(9999), NotFoundError);
  });

  test('refuses to delete a model that has results', async () => {
    const model = await createModel(modelParams('busy'));
    const prompt = await createPrompt({ text: 'Compare answers' });
    await createResult({ promptId: prompt.id, modelId: model.id, responseText: 'kept' });

    await assert.rejects(deleteModel(model.id), (error: unknown) => {
      assert(error instanceof ProviderInUseError);
      assert.equal(error.statusCode, 409);
      assert.equal(error.resultCount, 1);
      return true;
    });

    assert(await findModelById(model.id), 'Model should survive a refused delete');
    const results = await findResults(prompt.id);
    assert.deepEqual(
      results.map((result) => result.responseText),
      ['kept']
    );

    const deactivated = await setModelActive(model.id, false);
    assert.equal(deactivated.isActive, false);
    assert.equal((await findResults(prompt.id)).length, 1, 'Inactive models keep their history');
  });

  test('deletes unreferenced models', async () => {
    const model = await createModel(modelParams('spare'));
    await deleteModel(model.id);
    assert.equal(await findModelById(model.id), undefined);
    await assert.rejects(deleteModel(model.id), NotFoundError);
  });

  test('resolves credentials through the injected resolver', async () => {
    const model = await createModel(modelParams('keyed'));
    const secrets = createStaticSecretResolver({ KEYED_KEY: ' test-secret ', BLANK_KEY: '  ' });

    assert.equal(await resolveCredential(model, secrets), 'test-secret');
    await assert.rejects(
      resolveCredential({ ...model, credentialKey: 'BLANK_KEY' }, secrets),
      MissingCredentialError
    );
    await assert.rejects(
      resolveCredential({ ...model, credentialKey: 'ABSENT_KEY' }, secrets),
      MissingCredentialError
    );
  });
});
