import assert from 'node:assert/strict';
import { after, beforeEach, describe, test } from 'node:test';
import { db } from '../src/db';
import { ValidationError } from '../src/errors';
import { createModel } from '../src/repositories/modelRepository';
import {
  createPrompt,
  deletePrompt,
  findPromptById,
  listPrompts,
  normalizeTags,
  searchPrompts
} from '../src/repositories/promptRepository';
import { createResult, findResults } from '../src/repositories/resultRepository';
import { resetDatabase } from './helpers';

beforeEach(resetDatabase);
after(async () => {
  await db.destroy();
});

describe('prompt store', () => {
  test('stores text and ordered tags', async () => {
    const created = await createPrompt({
      text: 'Summarize the release notes',
      tags: ['release', ' notes ', '', 'release', 'weekly,digest']
    });

    assert.equal(created.text, 'Summarize the release notes');
    assert.deepEqual(created.tags, ['release', 'notes', 'weekly', 'digest']);

    const row = await db('prompts').where({ id: created.id }).first();
    assert.equal(row.tags, 'release,notes,weekly,digest', 'Tags should be stored comma-joined');

    const found = await findPromptById(created.id);
    assert.deepEqual(found, created);
  });

  test('rejects blank prompt text', async () => {
    await assert.rejects(createPrompt({ text: '   ' }), ValidationError);
  });

  test('stores prompts without tags as an empty list', async () => {
    const created = await createPrompt({ text: 'No tags here' });
    assert.deepEqual(created.tags, []);
    const row = await db('prompts').where({ id: created.id }).first();
    assert.equal(row.tags, null);
  });

  test('lists newest first by default and honours the sort whitelist', async () => {
    const first = await createPrompt({ text: 'beta', createdAt: new Date('2026-01-01T00:00:00.000Z') });
    const second = await createPrompt({ text: 'alpha', createdAt: new Date('2026-01-02T00:00:00.000Z') });

    const byDate = await listPrompts();
    assert.deepEqual(
      byDate.map((prompt) => prompt.id),
      [second.id, first.id]
    );

    const byText = await listPrompts({ sortBy: 'prompt', order: 'asc' });
    assert.deepEqual(
      byText.map((prompt) => prompt.text),
      ['alpha', 'beta']
    );

    const fallback = await listPrompts({ sortBy: 'tags; drop table prompts', order: 'sideways' });
    assert.deepEqual(
      fallback.map((prompt) => prompt.id),
      [second.id, first.id]
    );
  });

  test('searches text and tags', async () => {
    const byText = await createPrompt({ text: 'Translate this invoice', tags: ['finance'] });
    const byTag = await createPrompt({ text: 'Draft a reply', tags: ['invoice'] });
    await createPrompt({ text: 'Unrelated', tags: ['misc'] });
    await createPrompt({ text: 'Discount of 50% applied' });

    const matches = await searchPrompts('invoice');
    assert.deepEqual(
      matches.map((prompt) => prompt.id).sort((a, b) => a - b),
      [byText.id, byTag.id]
    );

    const percent = await searchPrompts('50%');
    assert.deepEqual(
      percent.map((prompt) => prompt.text),
      ['Discount of 50% applied']
    );
    assert.equal((await searchPrompts('%')).length, 1, 'Wildcards in the query should match literally');
  });

  test('deleting a prompt removes its results and leaves others alone', async () => {
    const model = await createModel({
      name: 'primary',
      apiUrl: 'https://llm.test/v1/chat/completions',
      credentialKey: 'PRIMARY_KEY'
    });
    const doomed = await createPrompt({ text: 'Delete me' });
    const kept = await createPrompt({ text: 'Keep me' });
    await createResult({ promptId: doomed.id, modelId: model.id, responseText: 'one' });
    await createResult({ promptId: doomed.id, modelId: model.id, responseText: 'two' });
    await createResult({ promptId: kept.id, modelId: model.id, responseText: 'three' });

    assert.equal(await deletePrompt(doomed.id), true);

    assert.equal(await findPromptById(doomed.id), undefined);
    const orphans = await db('results').where({ prompt_id: doomed.id });
    assert.equal(orphans.length, 0, 'Results of a deleted prompt must not survive');
    assert.equal((await findResults(kept.id)).length, 1);

    assert.equal(await deletePrompt(doomed.id), false, 'Deleting twice reports nothing deleted');
  });
});

describe('normalizeTags', () => {
  test('keeps first occurrence order', () => {
    assert.deepEqual(normalizeTags(['b', 'a', 'b', 'c , a']), ['b', 'a', 'c']);
  });
});
