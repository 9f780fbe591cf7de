// SkopeoInspector — image inspection via `skopeo inspect docker://<ref>`
//
// Supplies the last-published timestamp (recency) and the image metadata
// recorded in the report: digest, layer count and compressed size.

import { z } from 'zod';
import { runChecked, runCommand } from './exec.js';
import type { CommandRunner } from './exec.js';
import type { ImageInspection, ImageInspector } from '../types/index.js';

const SkopeoInspectSchema = z.object({
  Created: z.string().optional(),
  Digest: z.string().optional(),
  Layers: z.array(z.string()).optional(),
  LayersData: z
    .array(z.object({ Size: z.number().optional() }).passthrough())
    .nullable()
    .optional(),
}).passthrough();

export class SkopeoInspector implements ImageInspector {
  readonly name = 'skopeo';

  constructor(
    private readonly runner: CommandRunner = runCommand,
    private readonly binary = 'skopeo',
  ) {}

  async inspect(ref: string, signal: AbortSignal): Promise<ImageInspection> {
    const stdout = await runChecked(this.runner, this.binary, ['inspect', `docker://${ref}`], signal);
    return parseSkopeoInspect(stdout);
  }
}

/** Map `skopeo inspect` JSON onto an ImageInspection. Empty output → empty inspection. */
export function parseSkopeoInspect(stdout: string): ImageInspection {
  const trimmed = stdout.trim();
  if (!trimmed) return {};

  const data = SkopeoInspectSchema.parse(JSON.parse(trimmed));
  const inspection: ImageInspection = {};

  if (data.Created) inspection.created = data.Created;
  if (data.Digest) inspection.digest = data.Digest;
  if (data.Layers) inspection.layers = data.Layers.length;

  const sizes = (data.LayersData ?? [])
    .map((layer) => layer.Size)
    .filter((size): size is number => typeof size === 'number');
  if (sizes.length > 0) {
    inspection.sizeBytes = sizes.reduce((sum, size) => sum + size, 0);
  }

  return inspection;
}
