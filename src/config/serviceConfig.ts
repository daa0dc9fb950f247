/**
 * Service Configuration
 * Loads the relay's settings file (YAML or JSON), deep-merges it over the
 * defaults and validates the result.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { cloneDeep, get as getPath, has as hasPath, mergeWith, set as setPath } from 'lodash';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../errors';
import logger from '../utils/logger';

const attachmentWaitSchema = z.object({
  base_seconds: z.number().nonnegative(),
  per_attachment_seconds: z.number().nonnegative(),
  max_seconds: z.number().nonnegative(),
});

export const serviceSettingsSchema = z.object({
  email: z.object({
    server: z.string(),
    port: z.number().int(),
    use_ssl: z.boolean(),
    username: z.string(),
    password: z.string(),
    inbox_folder: z.string(),
    check_interval: z.number().positive(),
    mark_as_read: z.boolean(),
    delete_after_print: z.boolean(),
  }),
  printer: z.object({
    name: z.string(),
    paper_size: z.string(),
    orientation: z.string(),
    quality: z.string(),
    duplex: z.boolean(),
    color: z.boolean(),
    cups_url: z.string(),
  }),
  filters: z.object({
    allowed_senders: z.array(z.string()),
    blocked_senders: z.array(z.string()),
    subject_keywords: z.array(z.string()),
    max_attachment_size: z.number().int().nonnegative(),
    allowed_attachments: z.array(z.string()),
  }),
  processing: z.object({
    print_text_emails: z.boolean(),
    print_html_emails: z.boolean(),
    print_attachments: z.boolean(),
    convert_html_to_pdf: z.boolean(),
    max_pages_per_document: z.number().int().nonnegative(),
    job_wait_timeout: z.number().nonnegative(),
    job_poll_interval_ms: z.number().int().positive().max(1000),
    attachment_wait: attachmentWaitSchema,
  }),
  api: z.object({
    enabled: z.boolean(),
    host: z.string(),
    port: z.number().int().positive(),
    key: z.string().nullable(),
  }),
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']),
    file: z.string().nullable(),
  }),
});

export type ServiceSettings = z.infer<typeof serviceSettingsSchema>;

export const DEFAULT_SERVICE_SETTINGS: ServiceSettings = {
  email: {
    server: 'imap.gmail.com',
    port: 993,
    use_ssl: true,
    username: '',
    password: '',
    inbox_folder: 'INBOX',
    check_interval: 30,
    mark_as_read: true,
    delete_after_print: false,
  },
  printer: {
    name: 'default',
    paper_size: 'A4',
    orientation: 'portrait',
    quality: 'draft',
    duplex: false,
    color: true,
    cups_url: 'http://localhost:631',
  },
  filters: {
    allowed_senders: [],
    blocked_senders: [],
    subject_keywords: [],
    max_attachment_size: 10 * 1024 * 1024,
    allowed_attachments: ['.pdf', '.txt', '.doc', '.docx', '.jpg', '.png'],
  },
  processing: {
    print_text_emails: true,
    print_html_emails: true,
    print_attachments: true,
    convert_html_to_pdf: true,
    max_pages_per_document: 50,
    job_wait_timeout: 20,
    job_poll_interval_ms: 500,
    attachment_wait: {
      base_seconds: 5,
      per_attachment_seconds: 2,
      max_seconds: 30,
    },
  },
  api: {
    enabled: true,
    host: '0.0.0.0',
    port: 5000,
    key: null,
  },
  logging: {
    level: 'info',
    file: 'mail-print-relay.log',
  },
};

// Lists in the file replace the defaults instead of merging index by index
function replaceArrays(_target: unknown, source: unknown): unknown {
  return Array.isArray(source) ? source : undefined;
}

function isJsonPath(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === '.json';
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

// fs errors need not pass `instanceof Error` (they may come from another realm)
export function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class ServiceConfig {
  private settings: ServiceSettings;

  private constructor(settings: ServiceSettings, readonly filePath: string | null) {
    this.settings = settings;
  }

  /**
   * Load settings from a YAML or JSON file. A missing file is created with
   * the defaults.
   */
  static async load(filePath: string): Promise<ServiceConfig> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error: unknown) {
      if (!isMissingFile(error)) {
        throw new ConfigurationError(`Cannot read configuration file ${filePath}`, [], {
          cause: error instanceof Error ? error : undefined,
          filePath,
        });
      }
      logger.warn('Configuration file not found, writing defaults', { filePath });
      const created = new ServiceConfig(cloneDeep(DEFAULT_SERVICE_SETTINGS), filePath);
      await created.save();
      return created;
    }

    let loaded: unknown;
    try {
      loaded = isJsonPath(filePath) ? JSON.parse(raw) : parseYaml(raw);
    } catch (error: unknown) {
      throw new ConfigurationError(`Cannot parse configuration file ${filePath}`, [], {
        cause: error instanceof Error ? error : undefined,
        filePath,
      });
    }

    return new ServiceConfig(ServiceConfig.mergeOverDefaults(loaded ?? {}), filePath);
  }

  /**
   * Build a configuration from in-memory overrides (used by tests and the CLI).
   */
  static fromObject(overrides: unknown = {}): ServiceConfig {
    return new ServiceConfig(ServiceConfig.mergeOverDefaults(overrides), null);
  }

  private static mergeOverDefaults(loaded: unknown): ServiceSettings {
    if (typeof loaded !== 'object' || loaded === null || Array.isArray(loaded)) {
      throw ConfigurationError.invalid(['root: expected a mapping of sections']);
    }
    const merged: unknown = mergeWith(cloneDeep(DEFAULT_SERVICE_SETTINGS), loaded, replaceArrays);
    const result = serviceSettingsSchema.safeParse(merged);
    if (!result.success) {
      throw ConfigurationError.invalid(formatIssues(result.error));
    }
    return result.data;
  }

  get values(): ServiceSettings {
    return this.settings;
  }

  /**
   * Read a value by dot path, e.g. `get('email.server')`.
   */
  get(key: string, defaultValue?: unknown): unknown {
    if (!hasPath(this.settings, key)) {
      return defaultValue;
    }
    const value: unknown = getPath(this.settings, key);
    return value;
  }

  /**
   * Set a value by dot path. The result must still satisfy the schema.
   */
  set(key: string, value: unknown): void {
    const updated = setPath(cloneDeep(this.settings), key, value);
    const result = serviceSettingsSchema.safeParse(updated);
    if (!result.success) {
      throw ConfigurationError.invalid(formatIssues(result.error));
    }
    this.settings = result.data;
  }

  /**
   * Write the current settings back to the file they came from.
   */
  async save(filePath: string | null = this.filePath): Promise<void> {
    if (!filePath) {
      throw new ConfigurationError('No configuration file path to save to');
    }
    const content = isJsonPath(filePath)
      ? `${JSON.stringify(this.settings, null, 2)}\n`
      : stringifyYaml(this.settings);
    await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
    logger.info('Configuration saved', { filePath });
  }

  /**
   * Check the settings the service cannot start without.
   */
  validate(): void {
    const issues: string[] = [];
    const { email, printer } = this.settings;

    if (!email.username) issues.push('email.username is required');
    if (!email.password) issues.push('email.password is required');
    if (email.port <= 0) issues.push('email.port must be positive');
    if (!printer.name.trim()) issues.push('printer.name must not be empty');

    if (issues.length > 0) {
      throw ConfigurationError.invalid(issues);
    }
  }
}
