import { describe, expect, it } from 'vitest';
import { advanceTurn, appendContent, canTransition, createTurnId, openTurn } from '../src/session/turn-context';
import { findPredefinedAnswer, DEFAULT_PREDEFINED_ANSWERS } from '../src/session/predefined-answers';
import { sliceForTyping, wait } from '../src/session/typing';

describe('turn lifecycle', () => {
  it('allows only forward transitions', () => {
    expect(canTransition('idle', 'sending')).toBe(true);
    expect(canTransition('sending', 'streaming')).toBe(true);
    expect(canTransition('sending', 'completed')).toBe(false);
    expect(canTransition('streaming', 'sending')).toBe(false);
    expect(canTransition('completed', 'cancelled')).toBe(false);
    expect(canTransition('failed', 'streaming')).toBe(false);
  });

  it('throws on an illegal transition', () => {
    const turn = openTurn('turn-1', 'hi', 0);
    expect(() => advanceTurn(turn, 'streaming')).toThrow('Illegal turn transition for turn-1: idle -> streaming');
  });

  it('appends content only while streaming', () => {
    const sending = advanceTurn(openTurn('turn-1', 'hi', 0), 'sending');
    expect(() => appendContent(sending, 'x')).toThrow('Cannot append content to turn-1 while sending');

    const streaming = appendContent(appendContent(advanceTurn(sending, 'streaming'), 'a'), 'b');
    expect(streaming.buffer).toBe('ab');
    expect(sending.buffer).toBe('');
  });

  it('builds turn ids from the clock', () => {
    expect(createTurnId(() => 100)).toMatch(/^turn-100-[0-9a-f]{1,6}$/);
  });
});

describe('predefined answers', () => {
  it('matches keywords case-insensitively', () => {
    expect(findPredefinedAnswer('Tell me about ZetaCube')).toBe(DEFAULT_PREDEFINED_ANSWERS[0]?.answer);
    expect(findPredefinedAnswer('NanoDC에 대해 알려줘')).toBe(DEFAULT_PREDEFINED_ANSWERS[1]?.answer);
    expect(findPredefinedAnswer('월별 매출을 보여줘')).toBeNull();
  });

  it('accepts a custom table', () => {
    const answers = [{ keywords: ['hours'], answer: 'We are open 9 to 5.' }];
    expect(findPredefinedAnswer('Opening HOURS?', answers)).toBe('We are open 9 to 5.');
  });
});

describe('typing playback', () => {
  it('slices by code point', () => {
    expect(sliceForTyping('제타큐브는', 3)).toEqual(['제타큐', '브는']);
    expect(sliceForTyping('😀😀😀😀', 3)).toEqual(['😀😀😀', '😀']);
    expect(sliceForTyping('', 3)).toEqual([]);
  });

  it('rejects the delay once the signal aborts', async () => {
    const controller = new AbortController();
    const pending = wait(1000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
  });
});
