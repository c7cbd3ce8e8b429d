import { describe, expect, it } from 'vitest';
import { TICKET_STATUSES } from '@ticketdesk/types';
import { canTransition } from './statusTransitions';

describe('ticket status transitions', () => {
  it('allows only open to in_progress and in_progress to closed', () => {
    const allowed = TICKET_STATUSES.flatMap((from) =>
      TICKET_STATUSES.filter((to) => canTransition(from, to)).map((to) => `${from}->${to}`)
    );

    expect(allowed).toEqual(['open->in_progress', 'in_progress->closed']);
  });

  it('rejects self-transitions, skips and reversals', () => {
    expect(canTransition('open', 'open')).toBe(false);
    expect(canTransition('open', 'closed')).toBe(false);
    expect(canTransition('closed', 'in_progress')).toBe(false);
    expect(canTransition('in_progress', 'open')).toBe(false);
  });
});
