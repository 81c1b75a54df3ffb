import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import {
  DEFAULT_INTER_PAGE_DELAY_MS,
  DEFAULT_LEGISLATIVE_MAX_REQUESTS,
  DEFAULT_MAX_CONCURRENT_ENTITIES,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MAX_RUN_IDLE_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  DEFAULT_USER_AGENT,
  PreconditionFailedError,
  errorMessage,
  optionalEnv,
  parseIntEnv,
  parseListEnv,
  type RetryOptions,
} from '@collector/shared';
import { DEFAULT_LEGISLATIVE_BASE_URL } from '@collector/legislative';
import type { BrandTarget } from '@collector/storefront';

export const ROOT_DIR = resolve(dirname(fileURLToPath(import.meta.url)), '../../..');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ScheduleConfig {
  productsIntervalMs: number;
  regulatoryIntervalMs: number;
  regulatoryStates: string[];
  regulatoryKeywords: string[];
}

export interface CollectorConfig {
  requestTimeoutMs: number;
  userAgent: string;
  maxConcurrentEntities: number;
  interPageDelayMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  maxRunIdleMs: number;
  brandsPath: string;
  alternateProfileBrands: string[];
  legislative: {
    /** Null when unset; regulatory runs then fail their precondition */
    apiKey: string | null;
    baseUrl: string;
    maxRequests: number;
  };
  schedule: ScheduleConfig;
}

export function loadConfig(): CollectorConfig {
  const brandsPath = optionalEnv('COLLECTOR_BRANDS_PATH', './config/brands.json');
  const concurrency = parseIntEnv('COLLECTOR_MAX_CONCURRENT_ENTITIES', DEFAULT_MAX_CONCURRENT_ENTITIES);

  return {
    requestTimeoutMs: parseIntEnv('COLLECTOR_REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS),
    userAgent: optionalEnv('COLLECTOR_USER_AGENT', DEFAULT_USER_AGENT),
    maxConcurrentEntities: Math.max(1, concurrency),
    interPageDelayMs: parseIntEnv('COLLECTOR_INTER_PAGE_DELAY_MS', DEFAULT_INTER_PAGE_DELAY_MS),
    maxRetries: parseIntEnv('COLLECTOR_MAX_RETRIES', DEFAULT_MAX_RETRIES),
    retryBaseDelayMs: parseIntEnv('COLLECTOR_RETRY_BASE_DELAY_MS', DEFAULT_RETRY_BASE_DELAY_MS),
    retryMaxDelayMs: parseIntEnv('COLLECTOR_RETRY_MAX_DELAY_MS', DEFAULT_RETRY_MAX_DELAY_MS),
    maxRunIdleMs: parseIntEnv('COLLECTOR_MAX_RUN_IDLE_MS', DEFAULT_MAX_RUN_IDLE_MS),
    brandsPath: isAbsolute(brandsPath) ? brandsPath : resolve(ROOT_DIR, brandsPath),
    alternateProfileBrands: parseListEnv('COLLECTOR_ALTERNATE_PROFILE_BRANDS'),
    legislative: {
      apiKey: process.env.LEGISLATIVE_API_KEY || null,
      baseUrl: optionalEnv('LEGISLATIVE_BASE_URL', DEFAULT_LEGISLATIVE_BASE_URL),
      maxRequests: parseIntEnv('LEGISLATIVE_MAX_REQUESTS', DEFAULT_LEGISLATIVE_MAX_REQUESTS),
    },
    schedule: {
      productsIntervalMs: parseIntEnv('SCHEDULE_PRODUCTS_INTERVAL_MS', DAY_MS),
      regulatoryIntervalMs: parseIntEnv('SCHEDULE_REGS_INTERVAL_MS', DAY_MS),
      regulatoryStates: parseListEnv('SCHEDULE_REGS_STATES').map((state) => state.toUpperCase()),
      regulatoryKeywords: parseListEnv('SCHEDULE_REGS_KEYWORDS'),
    },
  };
}

export function retryOptions(config: CollectorConfig): Partial<RetryOptions> {
  return {
    maxRetries: config.maxRetries,
    baseDelayMs: config.retryBaseDelayMs,
    maxDelayMs: config.retryMaxDelayMs,
  };
}

const brandSchema = z.object({
  key: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'must be lowercase letters, digits and dashes'),
  name: z.string().min(1),
  shopUrl: z.string().min(1).nullable().default(null),
  alternateProfile: z.boolean().default(false),
});

const brandsFileSchema = z
  .object({ brands: z.array(brandSchema) })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.brands.forEach((brand, index) => {
      if (seen.has(brand.key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['brands', index, 'key'],
          message: `duplicate brand key '${brand.key}'`,
        });
      }
      seen.add(brand.key);
    });
  });

/**
 * Validates a brands document. Brands listed in `alternateProfileBrands`
 * get the alternate request identity on top of the per-brand flag.
 */
export function parseBrands(raw: unknown, alternateProfileBrands: readonly string[] = []): BrandTarget[] {
  const parsed = brandsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid document';
    throw new PreconditionFailedError(`Invalid brands config (${detail})`);
  }

  const alternate = new Set(alternateProfileBrands);
  return parsed.data.brands.map((brand) => ({
    key: brand.key,
    name: brand.name,
    shopUrl: brand.shopUrl,
    alternateProfile: brand.alternateProfile || alternate.has(brand.key),
  }));
}

export async function loadBrands(path: string, alternateProfileBrands: readonly string[] = []): Promise<BrandTarget[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new PreconditionFailedError(`Cannot read brands config at ${path}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new PreconditionFailedError(`Brands config at ${path} is not valid JSON`);
  }
  return parseBrands(raw, alternateProfileBrands);
}
