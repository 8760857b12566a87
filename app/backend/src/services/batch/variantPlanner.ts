import type { EventRecord } from '../event/eventRecord';

export interface VariantPlan {
  label: string;
  event: EventRecord;
}

/**
 * An explicit background query is paged through (one hit per page); without
 * one, each variant searches a different angle on the title and venue.
 */
export const planVariants = (event: EventRecord, count: number): VariantPlan[] => {
  const explicit = event.backgroundQuery?.trim();
  if (explicit) {
    return Array.from({ length: count }, (_, index) => ({
      label: `Version ${index + 1}`,
      event: { ...event, backgroundQuery: explicit, page: index + 1 },
    }));
  }

  const base = event.title[0] ?? '';
  const queries = [
    base,
    `celebration ${base}`,
    `event venue ${event.venue}`,
    'event decoration',
    `party ${event.venue}`,
  ];
  return queries.slice(0, count).map((query, index) => ({
    label: `Version ${index + 1}`,
    event: { ...event, backgroundQuery: query, page: 1 },
  }));
};
