/**
 * Application configuration read from the environment
 */

import type { ErrorStrategy, TableNames } from '@jwp-tracker/core';
import { ConfigurationError, DEFAULTS, ERROR_STRATEGIES } from '@jwp-tracker/core';
import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  ADMIN_PASSWORD: z.string().optional(),
  GSPREAD_CREDENTIALS: z.string().optional(),
  SPREADSHEET_ID: z.string().optional(),
  DATA_WORKSHEET: z.string().default(DEFAULTS.DATA_TABLE),
  AUDIT_WORKSHEET: z.string().default(DEFAULTS.AUDIT_LOG_TABLE),
  AUDIT_ERROR_STRATEGY: z.enum(ERROR_STRATEGIES).default('log'),
});

export interface AppConfig {
  port: number;
  /** Unset disables admin login */
  adminPassword?: string;
  /** Service-account key file contents */
  credentialsJson?: string;
  spreadsheetId?: string;
  tables: TableNames;
  auditErrorStrategy: ErrorStrategy;
}

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Parses configuration from environment variables
 *
 * Blank variables count as unset.
 *
 * @throws {ConfigurationError} Naming every invalid variable
 *
 * @example
 * ```typescript
 * const config = loadConfig(process.env);
 * ```
 */
export const loadConfig = (env: Env): AppConfig => {
  const present = Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => {
      const value = entry[1];
      return value !== undefined && value.trim() !== '';
    }),
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(problems.join('; '));
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    adminPassword: parsed.ADMIN_PASSWORD,
    credentialsJson: parsed.GSPREAD_CREDENTIALS,
    spreadsheetId: parsed.SPREADSHEET_ID,
    tables: { data: parsed.DATA_WORKSHEET, auditLog: parsed.AUDIT_WORKSHEET },
    auditErrorStrategy: parsed.AUDIT_ERROR_STRATEGY,
  };
};
