import { z } from 'zod';

export interface EventRecord {
  time: string;
  date: string;
  /** Upper-cased, non-empty title lines in display order. */
  title: string[];
  venue: string;
  address: string;
  backgroundQuery?: string;
  page: number;
}

export const parseTitle = (raw: string): string[] =>
  raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => line.toUpperCase());

export const eventInputSchema = z.object({
  time: z.string().trim().min(1).max(40),
  date: z.string().trim().min(1).max(40),
  title: z
    .string()
    .max(300)
    .refine((value) => parseTitle(value).length > 0, 'Title must contain at least one non-empty line'),
  venue: z.string().trim().min(1).max(120),
  address: z.string().trim().min(1).max(160),
  backgroundQuery: z.string().trim().max(100).optional(),
  page: z.number().int().min(1).default(1),
});

export const toEventRecord = (input: unknown): EventRecord => {
  const parsed = eventInputSchema.parse(input);
  return {
    time: parsed.time,
    date: parsed.date,
    title: parseTitle(parsed.title),
    venue: parsed.venue,
    address: parsed.address,
    backgroundQuery: parsed.backgroundQuery || undefined,
    page: parsed.page,
  };
};

/** `event_20250314_v2.png` for a `14.03.2025` date; unparseable dates keep only the version. */
export const posterFileName = (date: string, version: number) => {
  const match = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/.exec(date.trim());
  if (!match) {
    return `event_v${version}.png`;
  }
  const [, day, month, year] = match;
  return `event_${year}${month.padStart(2, '0')}${day.padStart(2, '0')}_v${version}.png`;
};
