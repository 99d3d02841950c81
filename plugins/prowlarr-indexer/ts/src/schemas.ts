/**
 * Prowlarr API v1 response schemas
 *
 * Only the fields the plugin reads are declared; everything else Prowlarr
 * sends is ignored. Optional fields accept `null` because Prowlarr serializes
 * missing values that way.
 */

import { z } from 'zod';

export const prowlarrIndexerSchema = z.object({
  id: z.number().int(),
  name: z.string().nullish(),
  enable: z.boolean().default(false),
  /** `public`, `semiPrivate` or `private` */
  privacy: z.string().nullish(),
  protocol: z.string().nullish(),
  language: z.string().nullish(),
});

export type ProwlarrIndexer = z.infer<typeof prowlarrIndexerSchema>;

const flagSchema = z.union([z.string(), z.number()]);

export const prowlarrReleaseSchema = z.object({
  guid: z.string().nullish(),
  title: z.string().nullish(),
  sortTitle: z.string().nullish(),
  size: z.number().nullish(),
  indexerId: z.number().nullish(),
  indexer: z.string().nullish(),
  downloadUrl: z.string().nullish(),
  magnetUrl: z.string().nullish(),
  infoUrl: z.string().nullish(),
  publishDate: z.string().nullish(),
  seeders: z.number().nullish(),
  leechers: z.number().nullish(),
  peers: z.number().nullish(),
  imdbId: z.union([z.number(), z.string()]).nullish(),
  grabs: z.number().nullish(),
  /** A bitmask, or a list of tags such as `freeleech` */
  indexerFlags: z.union([z.number(), z.array(flagSchema)]).nullish(),
});

export type ProwlarrRelease = z.infer<typeof prowlarrReleaseSchema>;

export const systemStatusSchema = z.object({
  appName: z.string().default('Prowlarr'),
  instanceName: z.string().nullish(),
  version: z.string(),
  osName: z.string().nullish(),
  startTime: z.string().nullish(),
});

export type ProwlarrSystemStatus = z.infer<typeof systemStatusSchema>;
