/**
 * Receipt Split Engine - Input Schema
 *
 * Validates sessions arriving as untyped JSON from the scanning flow and
 * converts the wire form (`assignedTo: string[]` with the reserved "All"
 * entry) into the typed ItemAssignment variant.
 */

import { z } from 'zod';
import { invalidSessionError, type BillSplitError } from './errors.js';
import { DEFAULT_CURRENCY, type ItemAssignment, type Session } from './types.js';
import { parseAmount } from '../utils/money.js';

/** Reserved assignee meaning "split across everyone on the roster". */
export const ALL_PARTICIPANTS = 'All';

const amountSchema = z
  .union([z.number(), z.string()])
  .transform((value, ctx) => {
    const amount = parseAmount(value);
    if (amount === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must be a numeric amount' });
      return z.NEVER;
    }
    return amount;
  });

export const lineItemSchema = z.object({
  name: z.string().trim().min(1, 'Item name is required').describe('Display label from the receipt'),
  quantity: z.number().int().min(1).default(1).describe('Units on the line; display only'),
  amount: amountSchema.describe('Line total as printed, not unit price'),
  assignedTo: z.array(z.string().trim().min(1)).default([]).describe('Participant names, or "All"'),
});

export const sessionSchema = z
  .object({
    participants: z.array(z.string().trim().min(1)).describe('Everyone splitting the bill'),
    payer: z.string().trim().describe('Name of the person who paid'),
    enteredTotal: amountSchema.describe('Bill total as entered by the user'),
    items: z.array(lineItemSchema),
    currency: z.string().trim().length(3).toUpperCase().default(DEFAULT_CURRENCY),
  })
  .superRefine((session, ctx) => {
    const seen = new Set<string>();
    session.participants.forEach((participant, index) => {
      if (seen.has(participant)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate participant "${participant}"`,
          path: ['participants', index],
        });
      }
      seen.add(participant);
    });
  });

export type SessionInput = z.input<typeof sessionSchema>;

export function toItemAssignment(assignedTo: string[]): ItemAssignment {
  if (assignedTo.length === 0) return { kind: 'unassigned' };
  if (assignedTo.includes(ALL_PARTICIPANTS)) return { kind: 'everyone' };
  return { kind: 'subset', participantIds: [...new Set(assignedTo)] };
}

function toSession(parsed: z.output<typeof sessionSchema>): Session {
  return {
    participants: parsed.participants,
    payer: parsed.payer,
    enteredTotal: parsed.enteredTotal,
    currency: parsed.currency,
    items: parsed.items.map(item => ({
      name: item.name,
      quantity: item.quantity,
      amount: item.amount,
      assignment: toItemAssignment(item.assignedTo),
    })),
  };
}

export type SafeParseSessionResult =
  | { success: true; data: Session }
  | { success: false; error: BillSplitError<'invalid-session'> };

export function safeParseSession(input: unknown): SafeParseSessionResult {
  const parsed = sessionSchema.safeParse(input);
  if (!parsed.success) {
    return { success: false, error: invalidSessionError(parsed.error.issues) };
  }
  return { success: true, data: toSession(parsed.data) };
}

/**
 * Parse untyped input into a Session, throwing `invalid-session` on failure.
 */
export function parseSession(input: unknown): Session {
  const result = safeParseSession(input);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}
