import { AuditAction } from '../types';

export const MUTE_DURATION_SECONDS = 24 * 60 * 60;
export const BAN_STRIKE_COUNT = 3;

export type EscalationStep =
  | { action: 'warn' }
  | { action: 'mute'; durationSeconds: number }
  | { action: 'ban' };

/**
 * Maps the strike count after an increment to the action to take.
 * Counts of 3 and above saturate at ban.
 */
export function resolveEscalation(strikes: number): EscalationStep {
  if (strikes >= BAN_STRIKE_COUNT) {
    return { action: 'ban' };
  }

  if (strikes === 2) {
    return { action: 'mute', durationSeconds: MUTE_DURATION_SECONDS };
  }

  return { action: 'warn' };
}

export function escalationAuditAction(step: EscalationStep): AuditAction {
  switch (step.action) {
    case 'warn':
      return 'delete_warn';
    case 'mute':
      return 'delete_mute';
    case 'ban':
      return 'delete_ban';
  }
}
