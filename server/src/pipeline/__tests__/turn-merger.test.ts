import { describe, it, expect } from 'vitest';
import { mergeConsecutive } from '../turn-merger';
import type { RawMessage } from '../../types/index';

const message = (sender: string, text: string, isOwner = false): RawMessage => ({
  sender,
  text,
  date: '15/01/24',
  time: '21:45',
  isOwner,
});

describe('mergeConsecutive', () => {
  it('should return an empty list for empty input', () => {
    expect(mergeConsecutive([])).toEqual([]);
  });

  it('should join same-sender runs with newlines', () => {
    const turns = mergeConsecutive([
      message('Priya', 'Hiii'),
      message('Priya', 'Sun'),
      message('Priya', 'Kha h'),
      message('Rahul', 'ghar', true),
    ]);
    expect(turns.map((t) => t.text)).toEqual(['Hiii\nSun\nKha h', 'ghar']);
  });

  it('should keep the first message metadata for a merged turn', () => {
    const first = { ...message('Priya', 'a'), time: '09:00' };
    const [turn] = mergeConsecutive([first, { ...message('Priya', 'b'), time: '09:05' }]);
    expect(turn.time).toBe('09:00');
  });

  it('should never leave adjacent turns with the same sender', () => {
    const senders = ['A', 'A', 'B', 'A', 'B', 'B', 'B', 'C', 'A', 'A'];
    const turns = mergeConsecutive(senders.map((s, i) => message(s, `m${i}`)));
    for (let i = 1; i < turns.length; i++) {
      expect(turns[i].sender).not.toBe(turns[i - 1].sender);
    }
    expect(turns.map((t) => t.sender)).toEqual(['A', 'B', 'A', 'B', 'C', 'A']);
  });

  it('should not mutate its input', () => {
    const input = [message('Priya', 'a'), message('Priya', 'b')];
    mergeConsecutive(input);
    expect(input[0].text).toBe('a');
  });
});
