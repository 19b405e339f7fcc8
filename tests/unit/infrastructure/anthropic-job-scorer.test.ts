import { describe, it, expect } from 'vitest';
import type Anthropic from '@anthropic-ai/sdk';
import { AnthropicJobScorer } from '../../../src/infrastructure/anthropic/anthropic-job-scorer.js';
import type { MessagesClient, ScoringReply } from '../../../src/infrastructure/anthropic/anthropic-job-scorer.js';
import { ScoreReplyError, ScoringModelError } from '../../../src/scoring/errors.js';
import type { ScopeSummary } from '../../../src/scoring/scope-summary.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';
import { sampleScores } from '../../helpers/scoring-fixtures.js';

const scope: ScopeSummary = {
  total_sheets: 2,
  sheets_with_scope: 1,
  scope_indicator_counts: { Pavers: 1 },
  sheet_details: [{ sheet: 'Sheet L1.02: Paving Plan', summary: 'Entry pavers', density: 'Low', marked_scope: ['Pavers'] }],
};

class FakeMessages implements MessagesClient {
  readonly requests: Anthropic.MessageCreateParamsNonStreaming[] = [];

  constructor(private readonly reply: () => Promise<ScoringReply>) {}

  create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<ScoringReply> {
    this.requests.push(params);
    return this.reply();
  }
}

function scorer(messages: MessagesClient | null) {
  return new AnthropicJobScorer(messages, { model: 'test-model', maxTokens: 1024 }, new FakeLogger().asLogger());
}

describe('AnthropicJobScorer', () => {
  it('should send one user message with the scoring prompt', async () => {
    const messages = new FakeMessages(async () => ({
      content: [{ type: 'text', text: JSON.stringify(sampleScores()) }],
    }));

    const scores = expectOk(await scorer(messages).score(scope), 'score');

    expect(scores).toEqual(sampleScores());
    expect(messages.requests).toHaveLength(1);
    expect(messages.requests[0]?.model).toBe('test-model');
    expect(messages.requests[0]?.max_tokens).toBe(1024);
    expect(messages.requests[0]?.messages[0]?.role).toBe('user');
    expect(String(messages.requests[0]?.messages[0]?.content)).toContain('**Total sheets analyzed:** 2');
  });

  it('should fail without an API key', async () => {
    const error = expectErr(await scorer(null).score(scope), 'no key');

    expect(error).toBeInstanceOf(ScoringModelError);
    expect(error.message).toBe('ANTHROPIC_API_KEY environment variable not set');
  });

  it('should wrap a failed request', async () => {
    const messages = new FakeMessages(() => Promise.reject(new Error('overloaded_error')));

    const error = expectErr(await scorer(messages).score(scope), 'request failure');

    expect(error).toBeInstanceOf(ScoringModelError);
    expect(error.message).toBe('Scoring request failed: Error: overloaded_error');
  });

  it('should reject a reply without text', async () => {
    const messages = new FakeMessages(async () => ({ content: [{ type: 'tool_use' }] }));

    const error = expectErr(await scorer(messages).score(scope), 'no text');

    expect(error).toBeInstanceOf(ScoreReplyError);
    expect(error.message).toBe('Score reply has no text content');
  });
});
