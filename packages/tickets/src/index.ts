/**
 * @ticketdesk/tickets
 *
 * Ticket data access, the status state machine and the ticket lifecycle service.
 */

export { default as TicketModel } from './models/ticket';
export type { NewTicket, TicketChanges, TicketListFilters } from './models/ticket';
export { ALLOWED_STATUS_TRANSITIONS, canTransition } from './lib/statusTransitions';
export { TicketService } from './services/ticketService';
export type { TicketServiceOptions } from './services/ticketService';
