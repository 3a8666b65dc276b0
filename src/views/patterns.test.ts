import { describe, expect, it } from 'vitest';

import type { Message } from '../messages/message.js';
import { createPatternResolver, defaultPattern, exactPattern, getResponse } from './patterns.js';

const makeMessage = (text: string): Message => ({
  id: 1,
  platform: 'test',
  text,
  user: { id: 7, displayName: 'Tester (7)' },
  timestamp: 1000,
  raw: { text },
});

describe('pattern resolver', () => {
  const hello = () => 'hello back';
  const fallback = () => 'fallback';

  it('returns the first matching view', () => {
    const resolve = createPatternResolver([exactPattern('hello', hello), defaultPattern(fallback)]);

    expect(resolve(makeMessage('hello'))).toBe(hello);
    expect(resolve(makeMessage('Hello'))).toBe(fallback);
  });

  it('returns null when nothing matches', () => {
    const resolve = createPatternResolver([exactPattern('hello', hello)]);

    expect(resolve(makeMessage('bye'))).toBeNull();
  });

  it('names patterns', () => {
    expect(exactPattern('ping', hello).name).toBe('exact:ping');
    expect(defaultPattern(fallback).name).toBe('default');
  });
});

describe('getResponse', () => {
  it('awaits async views', async () => {
    await expect(getResponse(async (message) => `got ${message.text}`, makeMessage('x'))).resolves.toBe(
      'got x',
    );
  });

  it('normalizes empty output to null', async () => {
    await expect(getResponse(() => '', makeMessage('x'))).resolves.toBeNull();
    await expect(getResponse(() => undefined, makeMessage('x'))).resolves.toBeNull();
    await expect(getResponse(async () => null, makeMessage('x'))).resolves.toBeNull();
  });
});
