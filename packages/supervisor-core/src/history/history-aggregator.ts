/**
 * HistoryAggregator — folds each worker activation into the transcript.
 *
 * Applied once per completed worker span, not as a post-processing pass, so
 * transcript limits are enforced while the run is still going.
 *
 *   full_history — every message of the span, in production order
 *   last_message — only the worker's final message of the span
 *
 * A custom AggregationPolicy replaces the built-in rule.
 */

import {
  WorkflowConfigError,
  type AggregationPolicy,
  type MessageDraft,
  type OutputMode,
  type WorkerSpan,
} from '@switchboard/supervisor-contracts';

export const fullHistoryPolicy: AggregationPolicy = (span) => span.messages;

export const lastMessagePolicy: AggregationPolicy = (span) => {
  const last = span.messages[span.messages.length - 1];
  return last ? [last] : [];
};

const BUILT_IN_POLICIES: Record<OutputMode, AggregationPolicy> = {
  full_history: fullHistoryPolicy,
  last_message: lastMessagePolicy,
};

export interface FoldResult {
  /** Messages to append, in order */
  visible: readonly MessageDraft[];
  kept: number;
  dropped: number;
}

export class HistoryAggregator {
  private readonly policy: AggregationPolicy;

  constructor(mode: OutputMode, policy?: AggregationPolicy) {
    this.policy = policy ?? BUILT_IN_POLICIES[mode];
  }

  fold(span: WorkerSpan): FoldResult {
    let visible: readonly MessageDraft[];
    try {
      visible = this.policy(span);
    } catch (error) {
      throw new WorkflowConfigError(
        `Aggregation policy failed for "${span.agent.name}": ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    if (!Array.isArray(visible)) {
      throw new WorkflowConfigError(`Aggregation policy for "${span.agent.name}" must return an array`);
    }
    assertSubsequence(span.messages, visible);

    return {
      visible,
      kept: visible.length,
      dropped: span.messages.length - visible.length,
    };
  }
}

/**
 * Policies may drop messages but never invent or reorder them.
 */
function assertSubsequence(source: readonly MessageDraft[], picked: readonly MessageDraft[]): void {
  let cursor = 0;
  for (const message of picked) {
    while (cursor < source.length && source[cursor] !== message) {
      cursor++;
    }
    if (cursor === source.length) {
      throw new WorkflowConfigError('Aggregation policy must return an ordered subset of the span messages');
    }
    cursor++;
  }
}
