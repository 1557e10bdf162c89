/**
 * Request schemas for the reconciliation endpoints.
 *
 * Bodies use snake_case on the wire; toTransaction/toPostReviewEntry map
 * them onto the engine's types.
 */

import { z } from 'zod';
import type { PostReviewEntry } from '../matching/postReview';
import type { Transaction } from '../matching/types';

const MAX_BATCH_SIZE = 10000;

const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

const isoDate = z
  .string()
  .refine(
    (value) => ISO_DATE_PREFIX.test(value) && !Number.isNaN(Date.parse(value)),
    'Expected an ISO 8601 date'
  )
  .transform((value) => new Date(value));

export const transactionSchema = z.object({
  transaction_id: z.string().trim().min(1, 'transaction_id is required'),
  date: isoDate,
  amount: z.number().finite(),
  description: z.string().default(''),
  reference: z.string().optional(),
  email: z.string().optional(),
  client_identifier: z.string().optional(),
  platform: z.string().min(1).optional(),
  platform_metadata: z.record(z.string().optional()).default({}),
});

export const piiSchema = z.object({
  name: z.string().optional(),
  address: z.string().optional(),
  business_number: z.string().optional(),
  phone: z.string().optional(),
  email: z.string().optional(),
});

export const resolveBodySchema = z.object({
  platform: z.string().min(1).default('api'),
  transactions: z.array(transactionSchema).min(1).max(MAX_BATCH_SIZE),
});

export const postReviewBodySchema = z.object({
  platform: z.string().min(1).default('api'),
  transactions: z
    .array(
      transactionSchema.extend({
        previously_matched: z.boolean().default(false),
        matched_client_id: z.string().optional(),
        pii: piiSchema.default({}),
      })
    )
    .min(1)
    .max(MAX_BATCH_SIZE),
});

export type TransactionBody = z.infer<typeof transactionSchema>;
export type ResolveBody = z.infer<typeof resolveBodySchema>;
export type PostReviewBody = z.infer<typeof postReviewBodySchema>;

export const toTransaction = (body: TransactionBody, defaultPlatform: string): Transaction => ({
  transactionId: body.transaction_id,
  date: body.date,
  amount: body.amount,
  description: body.description,
  reference: body.reference,
  email: body.email,
  clientIdentifier: body.client_identifier,
  platform: body.platform ?? defaultPlatform,
  platformMetadata: body.platform_metadata,
});

export const toPostReviewEntry = (
  body: PostReviewBody['transactions'][number],
  defaultPlatform: string
): PostReviewEntry => ({
  transaction: toTransaction(body, defaultPlatform),
  previouslyMatched: body.previously_matched,
  previousClientId: body.matched_client_id,
  pii: {
    name: body.pii.name,
    address: body.pii.address,
    businessNumber: body.pii.business_number,
    phone: body.pii.phone,
    email: body.pii.email,
  },
});
