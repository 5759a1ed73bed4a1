import { z } from 'zod';
import type { EmbedFieldData } from '../../shared/utils/embed.js';

/** Named group of scores (e.g. "cpu"); case-sensitive, any string */
export type Category = string;

/** Chat platform user id (Discord snowflake as a decimal string) */
export type UserId = string;

/**
 * One user's best score in a category
 */
export interface ScoreEntry {
  userId: UserId;
  score: number;
}

/**
 * Persisted layout: `{ [category]: { [userId]: score } }`
 */
export type ScoreDocument = Record<Category, Record<UserId, number>>;

const scoreTableSchema = z.record(
  z.string(),
  z.record(z.string(), z.number().finite())
);

/**
 * Validates the stored document and hands back the parsed JSON itself.
 * Parsing through z.record would rebuild the object and drop a "__proto__" key,
 * which is a valid category name.
 */
export const scoreDocumentSchema: z.ZodType<ScoreDocument> = z
  .custom<ScoreDocument>()
  .superRefine((value, ctx) => {
    const result = scoreTableSchema.safeParse(value);
    if (!result.success) {
      for (const issue of result.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: issue.path, message: issue.message });
      }
    }
  });

/**
 * Read-only view of committed scores
 */
export type ScoreSnapshot = ReadonlyMap<Category, ReadonlyMap<UserId, number>>;

/**
 * Outcome of submitting a score
 */
export type PutResult =
  | { status: 'accepted'; previous: number | null; score: number }
  | { status: 'rejected'; previous: number; score: number };

export type RemoveResult = 'removed' | 'not_found';

/**
 * A user as shown in replies
 */
export interface UserRef {
  id: UserId;
  name: string;
}

/**
 * Platform-neutral reply produced by the facade
 */
export type BenchmarkReply =
  | { kind: 'message'; content: string }
  | { kind: 'embed'; title: string; color: number; fields: EmbedFieldData[] };
