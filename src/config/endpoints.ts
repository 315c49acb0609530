/**
 * Endpoint list loading
 * Reads the endpoint document from an inline value or a file and validates it
 */

import { readFile } from 'node:fs/promises';
import { ConfigError } from '@core/errors.ts';
import type { Logger } from '@services/logger/createLogger.ts';
import { stripWhitespace } from '@utils/text.ts';
import { z } from 'zod';
import { type Endpoint, emptyGymData } from '../types/index.ts';

/**
 * Where the endpoint document comes from
 */
export interface EndpointSource {
  /** Inline JSON document, used when non-empty */
  inline?: string | undefined;
  /** File read when there is no inline document */
  filePath: string;
}

const headerSchema = z.object({
  key: z.string(),
  value: z.string(),
});

const gymDataSchema = z
  .object({
    capacity: z.number().int().default(0),
    count: z.number().int().default(0),
    last_update: z.string().datetime({ offset: true }).nullable().optional(),
  })
  .transform((data) => ({
    capacity: data.capacity,
    count: data.count,
    lastUpdate: data.last_update ? new Date(data.last_update) : null,
  }));

const gymSchema = z
  .object({
    shortcode: z.string().min(1),
    brand: z.string().default(''),
    location: z.string().default(''),
    data: gymDataSchema.optional(),
  })
  .transform((gym) => ({
    shortCode: gym.shortcode,
    brand: gym.brand,
    location: gym.location,
    data: gym.data ?? emptyGymData(),
  }));

const endpointSchema = z.object({
  name: z.string(),
  brand: z.string().default(''),
  url: z.string().min(1),
  id: z.string().min(1),
  headers: z.array(headerSchema).default([]),
  timezone: z
    .string()
    .optional()
    .transform((zone) => zone || undefined),
  gyms: z.array(gymSchema).default([]),
});

const endpointListSchema = z.array(endpointSchema);

/**
 * Parse and validate an endpoint document
 */
export function parseEndpoints(raw: string): Endpoint[] {
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError('could not parse config', { cause: error });
  }

  const result = endpointListSchema.safeParse(document);
  if (!result.success) {
    const details = result.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`invalid config (${details})`, { cause: result.error });
  }

  return result.data;
}

/**
 * Load the endpoint list, preferring the inline document over the file
 */
export async function loadEndpoints(source: EndpointSource, logger: Logger): Promise<Endpoint[]> {
  let raw = source.inline ?? '';

  if (raw.length === 0) {
    logger.debug({ path: source.filePath }, 'getting config from file');
    try {
      raw = await readFile(source.filePath, 'utf8');
    } catch (error) {
      throw new ConfigError(`could not read config from ${source.filePath}`, { cause: error });
    }
    logger.debug(
      { path: source.filePath, rawConfig: stripWhitespace(raw) },
      'got config from file'
    );
  } else {
    logger.debug({ rawConfig: stripWhitespace(raw) }, 'got config from env');
  }

  return parseEndpoints(raw);
}
