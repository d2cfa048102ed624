import { NonConformanceStatus } from '../database/entities/non-conformance.entity';

/**
 * Allowed status moves. Work proceeds open → investigating →
 * action_required → closed; any unclosed state may close directly and
 * a closed NC may be reopened.
 */
const TRANSITIONS: Record<NonConformanceStatus, readonly NonConformanceStatus[]> = {
  open: ['investigating', 'closed'],
  investigating: ['action_required', 'closed'],
  action_required: ['closed'],
  closed: ['open'],
};

export function canTransition(
  from: NonConformanceStatus,
  to: NonConformanceStatus,
): boolean {
  return from === to || TRANSITIONS[from].includes(to);
}
