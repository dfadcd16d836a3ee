/**
 * Sync Command Definitions
 */

import { z } from 'zod';

export const syncSchema = z.object({
  append: z.boolean().default(false),
  outfile: z.string().min(1).optional(), // overrides RHODL_OUTFILE
  envFile: z.string().min(1).optional(), // dotenv file, defaults to ./.env
});

export type SyncCommandOptions = z.infer<typeof syncSchema>;
