/**
 * Unit tests for transcript pruning
 */

import { describe, it, expect } from 'vitest';
import { buildTranscriptView } from '../../src/sessions/transcript-view.js';
import type { TranscriptTurn, TurnRole } from '../../src/sessions/types.js';

function turn(seq: number, role: TurnRole, content: string): TranscriptTurn {
  return { seq, role, content, timestamp: seq };
}

const transcript: TranscriptTurn[] = [
  turn(1, 'user', 'aaaa'),
  turn(2, 'tool', 'TTTTTTTTTT'),
  turn(3, 'assistant', 'bbbb'),
  turn(4, 'user', 'cccc'),
  turn(5, 'tool', 'UUUUUUUUUU'),
  turn(6, 'assistant', 'dddd'),
];

describe('buildTranscriptView()', () => {
  it('should keep everything without limits', () => {
    const view = buildTranscriptView(transcript);
    expect(view.turns).toHaveLength(6);
    expect(view.dropped).toBe(0);
    expect(view.chars).toBe(36);
  });

  it('should drop the oldest tool turns first', () => {
    const view = buildTranscriptView(transcript, { keepRecentTurns: 2, maxChars: 26 });
    expect(view.turns.map((t) => t.seq)).toEqual([1, 3, 4, 5, 6]);
    expect(view.dropped).toBe(1);
    expect(view.chars).toBe(26);
  });

  it('should then drop unprotected conversational turns oldest first', () => {
    const view = buildTranscriptView(transcript, { keepRecentTurns: 2, maxTurns: 3 });
    expect(view.turns.map((t) => t.seq)).toEqual([3, 4, 6]);
    expect(view.dropped).toBe(3);
  });

  it('should never drop protected recent turns', () => {
    const view = buildTranscriptView(transcript, { keepRecentTurns: 4, maxChars: 1 });
    expect(view.turns.map((t) => t.seq)).toEqual([1, 3, 4, 6]);
    expect(view.chars).toBe(16);
  });

  it('should not mutate the input', () => {
    buildTranscriptView(transcript, { keepRecentTurns: 0, maxTurns: 1 });
    expect(transcript).toHaveLength(6);
  });
});
