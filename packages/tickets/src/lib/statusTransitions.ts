import type { TicketStatus } from '@ticketdesk/types';

// Tickets move one step at a time; closed is terminal.
export const ALLOWED_STATUS_TRANSITIONS: Readonly<Record<TicketStatus, readonly TicketStatus[]>> = {
  open: ['in_progress'],
  in_progress: ['closed'],
  closed: [],
};

export function canTransition(from: TicketStatus, to: TicketStatus): boolean {
  return ALLOWED_STATUS_TRANSITIONS[from].includes(to);
}
