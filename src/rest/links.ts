import { z } from 'zod';

/** Hypermedia link of a resource. */
export interface Link {
  rel: string;
  href: string;
}

const HrefSchema = z.object({ href: z.string() }).passthrough();

/** `_links` as a list of `{ rel, href }` or as a HAL map keyed by rel. */
const LinksSchema = z.union([
  z.array(z.object({ rel: z.string(), href: z.string() }).passthrough()),
  z.record(z.union([HrefSchema, z.array(HrefSchema)])),
]);

/** Reads `_links` in either shape; anything else yields no links. */
export function parseLinks(value: unknown): Link[] {
  const result = LinksSchema.safeParse(value);
  if (!result.success) {
    return [];
  }

  if (Array.isArray(result.data)) {
    return result.data.map(({ rel, href }) => ({ rel, href }));
  }

  return Object.entries(result.data).flatMap(([rel, link]) =>
    (Array.isArray(link) ? link : [link]).map(({ href }) => ({ rel, href })),
  );
}

/** First `href` for `rel`, or `null`. */
export function findLink(links: Link[], rel: string): string | null {
  return links.find((link) => link.rel === rel)?.href ?? null;
}
