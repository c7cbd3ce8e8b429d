/**
 * @ticketdesk/types
 *
 * Shared type definitions for the ticketing packages.
 */

export * from './interfaces';
