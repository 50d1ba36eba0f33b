/**
 * Context-window pruning for transcripts
 *
 * Produces a view for the agent runtime; the stored transcript is untouched.
 * Oldest tool-result turns go first. The most recent `keepRecentTurns`
 * user/assistant turns are never dropped, even if the view stays over budget.
 */

import type { TranscriptTurn } from './types.js';

export const DEFAULT_KEEP_RECENT_TURNS = 12;

export interface TranscriptViewOptions {
  /** Conversational turns always kept (default: 12) */
  keepRecentTurns?: number;
  /** Max turns in the view */
  maxTurns?: number;
  /** Max total characters of turn content in the view */
  maxChars?: number;
}

export interface TranscriptView {
  turns: readonly TranscriptTurn[];
  /** Turns left out of the view */
  dropped: number;
  chars: number;
}

function isConversational(turn: TranscriptTurn): boolean {
  return turn.role === 'user' || turn.role === 'assistant';
}

export function buildTranscriptView(
  turns: readonly TranscriptTurn[],
  options: TranscriptViewOptions = {}
): TranscriptView {
  const keepRecent = Math.max(0, options.keepRecentTurns ?? DEFAULT_KEEP_RECENT_TURNS);
  const { maxTurns, maxChars } = options;

  const protectedIdx = new Set<number>();
  for (let i = turns.length - 1; i >= 0 && protectedIdx.size < keepRecent; i--) {
    if (isConversational(turns[i])) {
      protectedIdx.add(i);
    }
  }

  const removed = new Set<number>();
  let count = turns.length;
  let chars = turns.reduce((sum, turn) => sum + turn.content.length, 0);

  const overBudget = (): boolean =>
    (maxTurns !== undefined && count > maxTurns) || (maxChars !== undefined && chars > maxChars);

  const dropWhere = (eligible: (turn: TranscriptTurn, index: number) => boolean): void => {
    for (let i = 0; i < turns.length && overBudget(); i++) {
      if (removed.has(i) || !eligible(turns[i], i)) {
        continue;
      }
      removed.add(i);
      count--;
      chars -= turns[i].content.length;
    }
  };

  dropWhere((turn) => turn.role === 'tool');
  dropWhere((turn, index) => isConversational(turn) && !protectedIdx.has(index));

  return {
    turns: turns.filter((_, index) => !removed.has(index)),
    dropped: removed.size,
    chars,
  };
}
