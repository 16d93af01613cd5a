import assert from 'node:assert/strict';
import { describe, test } from 'node:test';
import {
  InvalidCompletionError,
  buildChatPayload,
  extractCompletionText,
  truncateResponse
} from '../src/services/chatCompletion';

describe('chat completion codec', () => {
  test('sends the configured model identifier, falling back to the model name', () => {
    assert.deepEqual(buildChatPayload({ name: 'openrouter-haiku', modelName: 'anthropic/claude-3-haiku' }, 'Hi'), {
      model: 'anthropic/claude-3-haiku',
      messages: [{ role: 'user', content: 'Hi' }],
      temperature: 0.7
    });
    assert.equal(buildChatPayload({ name: 'gpt-4o-mini', modelName: '  ' }, 'Hi').model, 'gpt-4o-mini');
    assert.equal(buildChatPayload({ name: 'gpt-4o-mini', modelName: null }, 'Hi').model, 'gpt-4o-mini');
  });

  test('extracts text from chat-completion and plain content replies', () => {
    assert.equal(extractCompletionText({ choices: [{ message: { role: 'assistant', content: 'Hello there' } }] }), 'Hello there');
    assert.equal(extractCompletionText({ choices: [{ message: { content: null } }] }), '');
    assert.equal(extractCompletionText({ content: 'Plain reply' }), 'Plain reply');
  });

  test('rejects replies without a message', () => {
    assert.throws(() => extractCompletionText({ choices: [] }), InvalidCompletionError);
    assert.throws(() => extractCompletionText('<html>Bad gateway</html>'), InvalidCompletionError);
    assert.throws(() => extractCompletionText(null), InvalidCompletionError);
  });

  test('truncates by code point', () => {
    assert.deepEqual(truncateResponse('abcdef', 4), { text: 'abcd', truncated: true });
    assert.deepEqual(truncateResponse('abc', 3), { text: 'abc', truncated: false });
    assert.deepEqual(truncateResponse('a😀b', 2), { text: 'a😀', truncated: true });
  });
});
