/**
 * @ticketdesk/product-api
 *
 * HTTP surface of the ticketing service.
 */

export { createApp } from './app';
export type { CreateAppOptions } from './app';
export type { ApiRequestContext } from './types';
