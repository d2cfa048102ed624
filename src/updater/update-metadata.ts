import { z } from 'zod';
import { UpdatePlatform } from './update-platform';

/** Missing or mistyped fields fall back to '' / 0 instead of failing */
const platformReleaseSchema = z.object({
  url: z.string().catch(''),
  size_mb: z.number().nonnegative().catch(0),
});

const optionalPlatform = platformReleaseSchema.optional().catch(undefined);

export const updateMetadataSchema = z.object({
  version: z.string().catch(''),
  download_url: z.string().catch(''),
  release_notes_url: z.string().catch(''),
  notes: z.string().catch(''),
  windows: optionalPlatform,
  linux: optionalPlatform,
  macos: optionalPlatform,
});

export type UpdateMetadata = z.infer<typeof updateMetadataSchema>;

export interface AvailableRelease {
  version: string;
  url: string;
  sizeMb: number;
  notes: string;
  releaseNotesUrl: string;
}

/** The platform entry's URL wins over the generic download URL. */
export function resolveRelease(
  metadata: UpdateMetadata,
  platform: UpdatePlatform,
): AvailableRelease {
  const entry = metadata[platform];
  return {
    version: metadata.version,
    url: entry?.url || metadata.download_url,
    sizeMb: entry?.size_mb ?? 0,
    notes: metadata.notes,
    releaseNotesUrl: metadata.release_notes_url,
  };
}
