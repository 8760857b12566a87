import { describe, expect, it } from 'vitest';

import { makeEvent } from '../../test/fixtures';
import { planVariants } from './variantPlanner';

describe('planVariants', () => {
  it('pages through an explicit background query', () => {
    const plans = planVariants(makeEvent({ backgroundQuery: ' rooftop party ' }), 3);

    expect(plans.map((plan) => plan.label)).toEqual(['Version 1', 'Version 2', 'Version 3']);
    expect(plans.map((plan) => [plan.event.backgroundQuery, plan.event.page])).toEqual([
      ['rooftop party', 1],
      ['rooftop party', 2],
      ['rooftop party', 3],
    ]);
  });

  it('derives a different query per variant from the first title line as entered', () => {
    const plans = planVariants(makeEvent({ title: ['NETWORKING EVENT BONN', 'SPRING'] }), 5);

    expect(plans.map((plan) => plan.event.backgroundQuery)).toEqual([
      'NETWORKING EVENT BONN',
      'celebration NETWORKING EVENT BONN',
      'event venue Gasthaus zum Schaf',
      'event decoration',
      'party Gasthaus zum Schaf',
    ]);
    expect(plans.every((plan) => plan.event.page === 1)).toBe(true);
  });

  it('keeps the rest of the event untouched', () => {
    const event = makeEvent();
    const [first] = planVariants(event, 1);

    expect(first?.event).toEqual({ ...event, backgroundQuery: 'REUNIÓN', page: 1 });
  });

  it('never plans more derived queries than it has', () => {
    expect(planVariants(makeEvent(), 2)).toHaveLength(2);
    expect(planVariants(makeEvent(), 8)).toHaveLength(5);
  });
});
