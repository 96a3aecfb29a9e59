/**
 * Receipt Split Engine - Errors
 *
 * Fatal conditions carry a machine-readable code plus typed details, in the
 * same shape as a Cloud Functions HttpsError.
 */

import type { ZodIssue } from 'zod';
import type { ParticipantId } from './types.js';

export interface BillSplitErrorDetails {
  'no-participants': Record<string, never>;
  'no-items': Record<string, never>;
  'invalid-payer': { payer: ParticipantId };
  'invalid-total': { enteredTotal: number };
  'invalid-item': { itemName: string; reason: string };
  'unknown-assignee': { participantId: ParticipantId; itemName: string };
  'totals-do-not-match': { allocated: number; expected: number; variancePercent: number };
  'invalid-session': { issues: ZodIssue[] };
  'invalid-config': { issues: ZodIssue[] };
}

export type BillSplitErrorCode = keyof BillSplitErrorDetails;

export class BillSplitError<C extends BillSplitErrorCode = BillSplitErrorCode> extends Error {
  readonly code: C;
  readonly details: BillSplitErrorDetails[C];

  constructor(code: C, message: string, details: BillSplitErrorDetails[C]) {
    super(message);
    this.name = 'BillSplitError';
    this.code = code;
    this.details = details;
  }
}

export function isBillSplitError(value: unknown): value is BillSplitError {
  return value instanceof BillSplitError;
}

// ============================================================================
// Factories
// ============================================================================

export function noParticipantsError(): BillSplitError<'no-participants'> {
  return new BillSplitError('no-participants', 'Cannot calculate splits without participants.', {});
}

export function noItemsError(): BillSplitError<'no-items'> {
  return new BillSplitError('no-items', 'Cannot calculate splits without items.', {});
}

export function invalidPayerError(payer: ParticipantId): BillSplitError<'invalid-payer'> {
  return new BillSplitError('invalid-payer', `Payer "${payer}" is not one of the participants.`, { payer });
}

export function invalidTotalError(enteredTotal: number): BillSplitError<'invalid-total'> {
  return new BillSplitError('invalid-total', 'Total amount must be greater than 0.', { enteredTotal });
}

export function invalidItemError(itemName: string, reason: string): BillSplitError<'invalid-item'> {
  return new BillSplitError('invalid-item', `Item "${itemName}" is invalid: ${reason}.`, { itemName, reason });
}

export function unknownAssigneeError(
  participantId: ParticipantId,
  itemName: string
): BillSplitError<'unknown-assignee'> {
  return new BillSplitError(
    'unknown-assignee',
    `Item "${itemName}" is assigned to "${participantId}", who is not a participant.`,
    { participantId, itemName }
  );
}

export function totalsDoNotMatchError(
  allocated: number,
  expected: number,
  variancePercent: number
): BillSplitError<'totals-do-not-match'> {
  return new BillSplitError(
    'totals-do-not-match',
    `Total mismatch: calculated ${allocated.toFixed(2)} vs entered ${expected.toFixed(2)} ` +
      `(variance ${variancePercent.toFixed(2)}%). Please verify the items.`,
    { allocated, expected, variancePercent }
  );
}

function summarizeIssues(issues: ZodIssue[]): string {
  return issues
    .slice(0, 3)
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function invalidSessionError(issues: ZodIssue[]): BillSplitError<'invalid-session'> {
  return new BillSplitError('invalid-session', `Invalid session: ${summarizeIssues(issues)}`, { issues });
}

export function invalidConfigError(issues: ZodIssue[]): BillSplitError<'invalid-config'> {
  return new BillSplitError('invalid-config', `Invalid split configuration: ${summarizeIssues(issues)}`, { issues });
}
