/**
 * Archive Configuration
 *
 * Loads and validates the downloader settings from environment variables.
 *
 * Environment Variables (REQUIRED):
 * - GONG_ACCESS_KEY         - API access key
 * - GONG_ACCESS_KEY_SECRET  - API access key secret
 * - GONG_SUBDOMAIN          - Tenant subdomain (e.g. 'acme' for acme.gong.io)
 *
 * Environment Variables (OPTIONAL):
 * - DOWNLOAD_START_DATE     - Inclusive start date (default 2022-01-01)
 * - DOWNLOAD_END_DATE       - Inclusive end date (default 2024-12-31)
 * - OUTPUT_DIRECTORY        - Root output directory (default ./transcripts)
 * - API_RATE_LIMIT          - Requests per second (default 2.5)
 * - API_TIMEOUT             - Per-request timeout in seconds (default 60)
 * - MAX_RETRIES             - Attempts per request (default 3)
 * - MAX_DISCOVERY_PAGES     - Pagination ceiling (default 10000)
 * - RESUME_POLICY           - 'reuse-cached' or 'always-rediscover'
 * - TITLE_FILTER            - Optional call title filter
 *
 * Every problem is collected and reported in a single ArchiveConfigError.
 */

import path from 'node:path';
import { z } from 'zod';
import { parseDateRange, startYear } from '../utils/date-range/index.js';
import type { DateRange } from '../utils/date-range/index.js';

export const PROGRESS_FILE_NAME = 'download_progress.json';

export const DEFAULT_START_DATE = '2022-01-01';
export const DEFAULT_END_DATE = '2024-12-31';

export const RESUME_POLICIES = ['reuse-cached', 'always-rediscover'] as const;

/**
 * How a run treats discovery results cached in the progress snapshot
 *
 * - reuse-cached: skip discovery when the snapshot holds discovered records
 * - always-rediscover: list calls again, keeping fetched ids that are still present
 */
export type ResumePolicy = (typeof RESUME_POLICIES)[number];

export type EnvironmentMap = Record<string, string | undefined>;

const requiredString = () =>
  z.string({ required_error: 'is required' }).min(1, 'is required');

const positiveNumber = (fallback: number) =>
  z.coerce
    .number({ invalid_type_error: 'must be a number' })
    .positive('must be greater than 0')
    .default(fallback);

const positiveInteger = (fallback: number) =>
  z.coerce
    .number({ invalid_type_error: 'must be a number' })
    .int('must be a whole number')
    .min(1, 'must be at least 1')
    .default(fallback);

const EnvironmentSchema = z.object({
  GONG_ACCESS_KEY: requiredString(),
  GONG_ACCESS_KEY_SECRET: requiredString(),
  GONG_SUBDOMAIN: requiredString(),
  OUTPUT_DIRECTORY: z.string().default('./transcripts'),
  API_RATE_LIMIT: positiveNumber(2.5),
  API_TIMEOUT: positiveNumber(60),
  MAX_RETRIES: positiveInteger(3),
  MAX_DISCOVERY_PAGES: positiveInteger(10000),
  RESUME_POLICY: z
    .enum(RESUME_POLICIES, {
      errorMap: () => ({ message: `must be one of: ${RESUME_POLICIES.join(', ')}` }),
    })
    .default('reuse-cached'),
  TITLE_FILTER: z.string().optional(),
});

/**
 * Validated settings
 */
export interface ArchiveSettings {
  accessKey: string;
  accessKeySecret: string;
  /** Normalized subdomain, e.g. 'acme' */
  subdomain: string;
  dateRange: DateRange;
  outputDirectory: string;
  requestsPerSecond: number;
  timeoutMs: number;
  maxAttempts: number;
  maxDiscoveryPages: number;
  resumePolicy: ResumePolicy;
  titleFilter?: string;
}

/**
 * Error thrown when the environment does not describe a usable configuration
 */
export class ArchiveConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(
      `Invalid configuration:\n${problems.map((problem) => `- ${problem}`).join('\n')}\n\n` +
        `Copy .env.example to .env and fill in the missing values.`
    );
    this.name = 'ArchiveConfigError';
  }
}

/**
 * Normalize a subdomain given as a bare name, a host or a full URL
 *
 * @example
 * normalizeSubdomain('https://Acme.gong.io/calls') // 'acme'
 */
export function normalizeSubdomain(value: string): string {
  let subdomain = value.trim().toLowerCase();

  if (subdomain.includes('://')) {
    subdomain = subdomain.slice(subdomain.lastIndexOf('://') + 3);
  }
  subdomain = subdomain.split('/')[0] ?? '';
  subdomain = subdomain.replace('.gong.io', '');
  if (subdomain.endsWith('.api')) {
    subdomain = subdomain.slice(0, -'.api'.length);
  }

  return subdomain;
}

/**
 * Drop empty values so that `FOO=` in a .env file means "use the default"
 */
function withoutEmptyValues(env: EnvironmentMap): EnvironmentMap {
  return Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
}

/**
 * Archive Configuration Manager
 *
 * Uses singleton pattern for convenient default access; tests construct
 * instances from an explicit environment map.
 */
export class ArchiveConfig {
  private static instance: ArchiveConfig | null = null;
  readonly settings: Readonly<ArchiveSettings>;

  /**
   * @param env - Environment variables to read (defaults to process.env)
   * @throws ArchiveConfigError listing every problem found
   */
  constructor(env: EnvironmentMap = process.env) {
    this.settings = ArchiveConfig.parse(env);
  }

  /**
   * Get singleton instance of ArchiveConfig
   * Lazily creates instance on first access
   */
  static getInstance(): ArchiveConfig {
    if (!ArchiveConfig.instance) {
      ArchiveConfig.instance = new ArchiveConfig();
    }
    return ArchiveConfig.instance;
  }

  /**
   * Reset singleton instance (useful for testing)
   */
  static resetInstance(): void {
    ArchiveConfig.instance = null;
  }

  private static parse(env: EnvironmentMap): ArchiveSettings {
    const problems: string[] = [];
    const result = EnvironmentSchema.safeParse(withoutEmptyValues(env));

    if (!result.success) {
      for (const issue of result.error.issues) {
        problems.push(`${issue.path.join('.')} ${issue.message}`);
      }
    }

    const startDate = env['DOWNLOAD_START_DATE']?.trim() || DEFAULT_START_DATE;
    const endDate = env['DOWNLOAD_END_DATE']?.trim() || DEFAULT_END_DATE;
    let dateRange: DateRange | undefined;
    try {
      dateRange = parseDateRange(startDate, endDate);
    } catch (error) {
      problems.push(
        `DOWNLOAD_START_DATE/DOWNLOAD_END_DATE: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const subdomain = result.success ? normalizeSubdomain(result.data.GONG_SUBDOMAIN) : '';
    if (result.success && !/^[a-z0-9-]+$/.test(subdomain)) {
      problems.push(`GONG_SUBDOMAIN '${result.data.GONG_SUBDOMAIN}' is not a valid subdomain`);
    }

    if (!result.success || dateRange === undefined || problems.length > 0) {
      throw new ArchiveConfigError(problems);
    }

    const data = result.data;
    return {
      accessKey: data.GONG_ACCESS_KEY,
      accessKeySecret: data.GONG_ACCESS_KEY_SECRET,
      subdomain,
      dateRange,
      outputDirectory: data.OUTPUT_DIRECTORY,
      requestsPerSecond: data.API_RATE_LIMIT,
      timeoutMs: data.API_TIMEOUT * 1000,
      maxAttempts: data.MAX_RETRIES,
      maxDiscoveryPages: data.MAX_DISCOVERY_PAGES,
      resumePolicy: data.RESUME_POLICY,
      titleFilter: data.TITLE_FILTER?.trim() || undefined,
    };
  }

  /**
   * API base URL, e.g. https://acme.api.gong.io
   */
  get baseUrl(): string {
    return `https://${this.settings.subdomain}.api.gong.io`;
  }

  /**
   * HTTP Basic authorization header value
   */
  get authHeader(): string {
    const credentials = `${this.settings.accessKey}:${this.settings.accessKeySecret}`;
    return `Basic ${Buffer.from(credentials, 'utf8').toString('base64')}`;
  }

  get dateRange(): DateRange {
    return this.settings.dateRange;
  }

  /**
   * Directory for this range's artifacts: <OUTPUT_DIRECTORY>/<start year>
   */
  get outputPath(): string {
    return path.join(this.settings.outputDirectory, String(startYear(this.settings.dateRange)));
  }

  get progressFilePath(): string {
    return path.join(this.outputPath, PROGRESS_FILE_NAME);
  }

  /**
   * Minimum spacing between requests derived from API_RATE_LIMIT
   */
  get minSpacingMs(): number {
    return 1000 / this.settings.requestsPerSecond;
  }

  /**
   * Settings safe to log (no credentials)
   */
  toLogContext(): Record<string, unknown> {
    return {
      subdomain: this.settings.subdomain,
      startDate: this.settings.dateRange.startDate,
      endDate: this.settings.dateRange.endDate,
      outputPath: this.outputPath,
      requestsPerSecond: this.settings.requestsPerSecond,
      timeoutMs: this.settings.timeoutMs,
      maxAttempts: this.settings.maxAttempts,
      maxDiscoveryPages: this.settings.maxDiscoveryPages,
      resumePolicy: this.settings.resumePolicy,
      titleFilter: this.settings.titleFilter,
    };
  }
}

/**
 * Convenience accessor for the singleton configuration
 */
export function getArchiveConfig(): ArchiveConfig {
  return ArchiveConfig.getInstance();
}
