import { z } from 'zod';
import { Country } from '../models/address.js';

export const PARSE_POLICIES = ['abort-pass', 'skip-record'] as const;

/**
 * What the menu normalizer does with a malformed record:
 * - abort-pass: drop the whole section the record belongs to
 * - skip-record: drop only that record and keep going
 */
export type ParsePolicy = (typeof PARSE_POLICIES)[number];

const API_BASE_URLS: Record<Country, string> = {
  [Country.UNITED_STATES]: 'https://order.dominos.com',
  [Country.CANADA]: 'https://order.dominos.ca',
};

const EnvSchema = z.object({
  DOMINOS_COUNTRY: z.nativeEnum(Country).default(Country.UNITED_STATES),
  DOMINOS_LANGUAGE: z.string().regex(/^[a-z]{2}$/, 'DOMINOS_LANGUAGE must be a two-letter code').default('en'),
  DOMINOS_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  DOMINOS_PARSE_POLICY: z.enum(PARSE_POLICIES).default('abort-pass'),
});

export interface DominosClientConfig {
  country: Country;
  baseUrl: string;
  language: string;
  timeoutMs: number;
  parsePolicy: ParsePolicy;
}

export function parseDominosConfig(env: NodeJS.ProcessEnv): DominosClientConfig {
  const parsed = EnvSchema.safeParse({
    DOMINOS_COUNTRY: env.DOMINOS_COUNTRY,
    DOMINOS_LANGUAGE: env.DOMINOS_LANGUAGE,
    DOMINOS_TIMEOUT_MS: env.DOMINOS_TIMEOUT_MS,
    DOMINOS_PARSE_POLICY: env.DOMINOS_PARSE_POLICY,
  });

  if (!parsed.success) {
    const issues = parsed.error.flatten().fieldErrors;
    throw new Error(`Invalid Dominos config: ${JSON.stringify(issues)}`);
  }

  return {
    country: parsed.data.DOMINOS_COUNTRY,
    baseUrl: API_BASE_URLS[parsed.data.DOMINOS_COUNTRY],
    language: parsed.data.DOMINOS_LANGUAGE,
    timeoutMs: parsed.data.DOMINOS_TIMEOUT_MS,
    parsePolicy: parsed.data.DOMINOS_PARSE_POLICY,
  };
}

export const DominosConfig: Readonly<DominosClientConfig> = Object.freeze(parseDominosConfig(process.env));
