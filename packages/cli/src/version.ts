import { readFileSync } from 'node:fs';
import { z } from 'zod';

const PackageManifest = z.object({ version: z.string() });

const manifest = PackageManifest.parse(
  JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8')),
);

export const VERSION: string = manifest.version;
