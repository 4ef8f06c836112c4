import { readFileSync } from 'fs';
import { z } from 'zod';
import type { SessionConfig } from '../../../shared/types/session';

// Exactly the four gates; anything else in the file is a configuration error
export const sessionConfigSchema = z
  .object({
    allowTies: z.boolean(),
    allowSkipping: z.boolean(),
    allowEditing: z.boolean(),
    debugMode: z.boolean(),
  })
  .strict();

export const parseSessionConfig = (raw: unknown): SessionConfig => sessionConfigSchema.parse(raw);

export const loadSessionConfig = (filePath: string): SessionConfig => {
  const contents = readFileSync(filePath, 'utf-8');
  return parseSessionConfig(JSON.parse(contents));
};
