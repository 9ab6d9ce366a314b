import { z } from 'zod';
import { isU64, U64_MAX } from './amounts.mts';
import { InvalidIntentError } from './errors.mts';

export type PartyId = string;
export type TokenId = string;

export interface Intent {
  sender: PartyId;
  receiver: PartyId;
  token: TokenId;
  amount: bigint;
}

export interface SerializedIntent {
  sender: PartyId;
  receiver: PartyId;
  token: TokenId;
  amount: string;
}

const AmountSchema = z
  .union([
    z.string().regex(/^\d+$/, 'amount must be a non-negative decimal integer'),
    z.number().int().nonnegative().safe()
  ])
  .transform(value => BigInt(value))
  .refine(isU64, { message: `amount must not exceed ${U64_MAX}` });

export const IntentSchema = z.object({
  sender: z.string().min(1),
  receiver: z.string().min(1),
  token: z.string().min(1),
  amount: AmountSchema
});

const IntentListSchema = z.array(IntentSchema);

export const IntentsDocumentSchema = z.union([
  IntentListSchema,
  z.object({ intents: IntentListSchema })
]);

export function parseIntentsDocument(json: unknown): Intent[] {
  const parsed = IntentsDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidIntentError({
      message: 'Invalid intents document',
      details: parsed.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message
      }))
    });
  }
  return Array.isArray(parsed.data) ? parsed.data : parsed.data.intents;
}

/**
 * Guard for intents handed to the engine without going through the schema: non-empty
 * identifiers and an amount within u64.
 */
export function assertValidIntent(intent: Intent, index: number): void {
  for (const field of ['sender', 'receiver', 'token'] as const) {
    if (typeof intent[field] !== 'string' || intent[field] === '') {
      throw new InvalidIntentError({ message: `Intent #${index} has an empty ${field}`, index });
    }
  }
  if (typeof intent.amount !== 'bigint' || !isU64(intent.amount)) {
    throw new InvalidIntentError({
      message: `Intent #${index} amount is outside the u64 range`,
      index,
      details: { amount: String(intent.amount) }
    });
  }
}

export function serializeIntent(intent: Intent): SerializedIntent {
  return {
    sender: intent.sender,
    receiver: intent.receiver,
    token: intent.token,
    amount: intent.amount.toString()
  };
}
