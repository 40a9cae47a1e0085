import { describe, test, expect, jest } from '@jest/globals';
import { buildPublicErrorEmbed, sendPublicError } from '../src/lib/errorReply.js';
import { normalizeError, redact } from '../src/utils/errors.js';

describe('error helpers', () => {
  test('redact masks tokens', () => {
    expect(redact('failed with token=test-secret')).toBe('failed with token=***');
    expect(redact('Authorization: Bot test-secret')).toBe('Authorization: Bot ***');
    expect(redact('nothing to hide')).toBe('nothing to hide');
  });

  test('normalizeError', () => {
    const n = normalizeError(new TypeError('bad secret=abc'));
    expect(n.name).toBe('TypeError');
    expect(n.message).toBe('bad secret=***');
    expect(normalizeError('plain')).toEqual({ name: 'string', message: 'plain', stack: '' });
  });

  test('public error embed carries the error id', () => {
    const e = buildPublicErrorEmbed('Something went wrong', 'Try again.', 'abc123').data;
    expect(e.title).toBe('❌ Something went wrong');
    expect(e.description).toBe('Try again.');
    expect(e.fields).toEqual([{ name: 'Error ID', value: '`abc123`' }]);
  });
});

describe('sendPublicError', () => {
  const opts = { title: 'Something went wrong', message: 'Try again.', errorId: 'abc123' };
  const ok = () => jest.fn(() => Promise.resolve());
  const gone = () => jest.fn(() => Promise.reject(new Error('Unknown interaction')));

  test('replies to an unanswered interaction', async () => {
    const ix = { deferred: false, replied: false, reply: ok(), editReply: ok(), followUp: ok() };
    await expect(sendPublicError(ix, opts)).resolves.toBe(true);
    expect(ix.reply).toHaveBeenCalledTimes(1);
    expect(ix.editReply).not.toHaveBeenCalled();
  });

  test('edits a deferred reply', async () => {
    const ix = { deferred: true, replied: false, reply: ok(), editReply: ok(), followUp: ok() };
    await expect(sendPublicError(ix, opts)).resolves.toBe(true);
    expect(ix.editReply).toHaveBeenCalledTimes(1);
    expect(ix.reply).not.toHaveBeenCalled();
  });

  test('falls back to a follow-up', async () => {
    const ix = { deferred: false, replied: false, reply: gone(), editReply: ok(), followUp: ok() };
    await expect(sendPublicError(ix, opts)).resolves.toBe(true);
    expect(ix.followUp).toHaveBeenCalledTimes(1);
  });

  test('reports failure when nothing gets through', async () => {
    const ix = { deferred: false, replied: true, reply: gone(), editReply: gone(), followUp: gone() };
    await expect(sendPublicError(ix, opts)).resolves.toBe(false);
  });
});
