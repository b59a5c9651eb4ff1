import { JSDOM } from 'jsdom';
import { z } from 'zod';
import type { Logger } from '../utils/logger.js';
import { ContentMemoryError, ErrorCode } from '../errors.js';

function parseOptionalInt(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const value = parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

export const config = {
  idAttribute: process.env.CONTENT_MEMORY_ID_ATTRIBUTE || '__id__',
  containerSelector: 'body',
  maxElements: parseOptionalInt(process.env.CONTENT_MEMORY_MAX_ELEMENTS),
  // Attributes that take part in the content-hash fallback identity
  hashAttributes: ['id', 'name', 'type', 'role', 'href', 'src', 'alt', 'title', 'aria-label', 'class'],
  markerAttribute: 'data-memory-state',
  markerIdAttribute: 'data-memory-id',
  // Leading comment that marks markup rendered by HTMLGenerator
  memoryRootComment: '<!--content-memory-->',
};

/** How a sighting of a stored element treats its stored markup */
export type MergePolicy = 'latest' | 'keep-first';

let selectorDocument: Document | undefined;

function isValidSelector(selector: string): boolean {
  selectorDocument ??= new JSDOM('').window.document;
  try {
    selectorDocument.querySelector(selector);
    return true;
  } catch {
    return false;
  }
}

/** Epoch milliseconds */
export type Clock = () => number;

/** Composes the baseline markup with rendered fragments */
export type MemoryAccumulator = (base: string | undefined, fragments: string[]) => string;

const isFunction = (value: unknown): boolean => typeof value === 'function';

export const contentMemoryOptionsSchema = z.object({
  idAttribute: z.string().min(1).default(config.idAttribute),
  containerSelector: z
    .string()
    .min(1)
    .refine(isValidSelector, 'containerSelector is not a valid CSS selector')
    .default(config.containerSelector),
  elementSelector: z.string().min(1).refine(isValidSelector, 'elementSelector is not a valid CSS selector').optional(),
  maxElements: z.number().int().positive().optional(),
  mergePolicy: z.enum(['latest', 'keep-first']).default('latest'),
  accumulate: z.boolean().default(true),
  now: z.custom<Clock>(isFunction, 'now must be a function').optional(),
  accumulator: z.custom<MemoryAccumulator>(isFunction, 'accumulator must be a function').optional(),
  logger: z
    .custom<Logger>((value) => typeof value === 'object' && value !== null, 'logger must be a pino logger')
    .optional(),
});

export type ContentMemoryOptions = z.input<typeof contentMemoryOptionsSchema>;

export interface ResolvedOptions {
  idAttribute: string;
  containerSelector: string;
  elementSelector?: string;
  maxElements?: number;
  mergePolicy: MergePolicy;
  accumulate: boolean;
  now: Clock;
  accumulator?: MemoryAccumulator;
  logger?: Logger;
}

export function resolveOptions(options: ContentMemoryOptions = {}): ResolvedOptions {
  const parsed = contentMemoryOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ContentMemoryError(ErrorCode.INVALID_CONFIG, 'Invalid content memory options', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  const { now, maxElements, ...rest } = parsed.data;
  return {
    ...rest,
    maxElements: maxElements ?? config.maxElements,
    now: now ?? Date.now,
  };
}
