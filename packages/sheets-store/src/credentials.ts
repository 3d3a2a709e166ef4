import { ConfigurationError, normalizeError } from '@jwp-tracker/core';
import { z } from 'zod';

const serviceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

/** The parts of a service-account key file used to authenticate */
export type ServiceAccountCredentials = z.infer<typeof serviceAccountSchema>;

/**
 * Parses a service-account key file's JSON
 *
 * @throws {ConfigurationError} If the text is not JSON or lacks the client email or private key
 */
export const parseServiceAccountCredentials = (json: string): ServiceAccountCredentials => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new ConfigurationError(`Google Sheets credentials are not valid JSON (${normalizeError(error).message})`);
  }

  const result = serviceAccountSchema.safeParse(parsed);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.') || '(root)');
    throw new ConfigurationError(`Google Sheets credentials are missing or invalid: ${fields.join(', ')}`);
  }
  return result.data;
};
