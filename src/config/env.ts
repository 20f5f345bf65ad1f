import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

import { DEFAULT_PARAMS } from '../engine/params.js';
import type { RatingParams } from '../engine/types.js';

export const FALLBACK_COMPETITION = 'tt_singles';

const EnvSchema = z.object({
  ELO_HOME: z.string().min(1).optional(),
  ELO_K_FACTOR: z.coerce.number().positive().default(DEFAULT_PARAMS.kFactor),
  ELO_INITIAL_RATING: z.coerce.number().finite().default(DEFAULT_PARAMS.initialRating),
  ELO_DEFAULT_COMPETITION: z.string().min(1).default(FALLBACK_COMPETITION),
});

export interface Settings {
  home: string;
  params: RatingParams;
  fallbackCompetition: string;
}

export const loadSettings = (env: NodeJS.ProcessEnv = process.env): Settings => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`invalid environment: ${issues}`);
  }

  const values = parsed.data;
  return {
    home: values.ELO_HOME ?? path.join(os.homedir(), '.elo'),
    params: {
      kFactor: values.ELO_K_FACTOR,
      initialRating: values.ELO_INITIAL_RATING,
    },
    fallbackCompetition: values.ELO_DEFAULT_COMPETITION,
  };
};
