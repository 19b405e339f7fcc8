import { z } from 'zod';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { ScoreReplyError } from './errors.js';

export const COMPANIES = [
  { key: 'erw_retaining_walls', name: 'ERW Retaining Walls' },
  { key: 'kaufman_concrete', name: 'Kaufman Concrete' },
  { key: 'landtec_landscape', name: 'Landtec Landscape' },
  { key: 'ratliff_hardscape', name: 'Ratliff Hardscape' },
] as const;

export type CompanyKey = (typeof COMPANIES)[number]['key'];

const Score = z.number().min(0).max(5);

const CompanyScoreSchema = z.object({
  score: Score,
  reasoning: z.string(),
  key_indicators: z.array(z.string()),
});

export const JobScoresSchema = z.object({
  erw_retaining_walls: CompanyScoreSchema,
  kaufman_concrete: CompanyScoreSchema,
  landtec_landscape: CompanyScoreSchema,
  ratliff_hardscape: CompanyScoreSchema,
  overall_recommendation: z.string(),
  package_score: Score,
});

export type CompanyScore = z.infer<typeof CompanyScoreSchema>;
export type JobScores = z.infer<typeof JobScoresSchema>;

/**
 * The model is asked for bare JSON but sometimes wraps it in a ```json (or
 * bare ```) fence. Take the first fenced block if there is one.
 */
export function extractReplyJson(reply: string): string {
  const fence = reply.includes('```json') ? '```json' : reply.includes('```') ? '```' : null;
  if (fence === null) return reply.trim();

  const afterOpen = reply.split(fence)[1] ?? '';
  return (afterOpen.split('```')[0] ?? '').trim();
}

export function parseScoreReply(reply: string): Result<JobScores, ScoreReplyError> {
  const text = extractReplyJson(reply);

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    return err(new ScoreReplyError(`Score reply is not JSON: ${e instanceof Error ? e.message : String(e)}`, reply));
  }

  const parsed = JobScoresSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    return err(new ScoreReplyError(`Score reply has the wrong shape: ${issues}`, reply));
  }
  return ok(parsed.data);
}
