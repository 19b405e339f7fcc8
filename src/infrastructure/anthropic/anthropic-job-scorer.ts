import Anthropic from '@anthropic-ai/sdk';
import { ResultAsync as RA, err, errAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import { describeCause } from '../../errors/formatter.js';
import { ScoreReplyError, ScoringModelError } from '../../scoring/errors.js';
import type { JobScores } from '../../scoring/job-scores.js';
import { parseScoreReply } from '../../scoring/job-scores.js';
import type { JobScorerPort } from '../../scoring/ports/job-scorer.port.js';
import { buildScoringPrompt } from '../../scoring/prompt.js';
import type { ScopeSummary } from '../../scoring/scope-summary.js';

/** What the scorer reads from a Messages API reply. */
export interface ScoringReply {
  readonly content: ReadonlyArray<{ readonly type: string; readonly text?: string }>;
}

/** `client.messages` of the Anthropic SDK satisfies this. */
export interface MessagesClient {
  create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<ScoringReply>;
}

export interface AnthropicJobScorerOptions {
  readonly model: string;
  readonly maxTokens: number;
}

export function createMessagesClient(apiKey: string, baseUrl: string | null): MessagesClient {
  return new Anthropic({ apiKey, ...(baseUrl !== null ? { baseURL: baseUrl } : {}) }).messages;
}

export class AnthropicJobScorer implements JobScorerPort {
  constructor(
    private readonly messages: MessagesClient | null,
    private readonly options: AnthropicJobScorerOptions,
    private readonly logger: Logger
  ) {}

  score(scope: ScopeSummary): ResultAsync<JobScores, ScoringModelError | ScoreReplyError> {
    if (this.messages === null) {
      return errAsync(new ScoringModelError('ANTHROPIC_API_KEY environment variable not set'));
    }

    const request = this.messages.create({
      model: this.options.model,
      max_tokens: this.options.maxTokens,
      messages: [{ role: 'user', content: buildScoringPrompt(scope) }],
    });

    return RA.fromPromise(request, (cause) => new ScoringModelError(`Scoring request failed: ${describeCause(cause)}`, cause))
      .andThen((reply) => {
        const text = reply.content.find((block) => block.type === 'text')?.text;
        if (text === undefined) {
          return err(new ScoreReplyError('Score reply has no text content', JSON.stringify(reply.content)));
        }
        this.logger.debug({ chars: text.length }, 'Score reply received');
        return parseScoreReply(text);
      });
  }
}
