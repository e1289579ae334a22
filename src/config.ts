import { z } from 'zod';
import { ConnectionError } from './errors.js';
import type { ErrorContext } from './types.js';

/** Service account fields the client authenticates with; others are dropped. */
export const credentialsSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

export type Credentials = z.infer<typeof credentialsSchema>;

export const connectionOptionsSchema = z.object({
  projectId: z.string().min(1),
  /** Empty string selects the default database. */
  databaseId: z.string().optional(),
  namespace: z.string().optional(),
  /** Service account key as JSON text or parsed object. */
  credentials: z.union([z.string(), z.record(z.string(), z.unknown())]).optional(),
});

export interface ConnectionOptions extends z.infer<typeof connectionOptionsSchema> {
  onError?: (context: ErrorContext, error: unknown) => void;
}

export function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function parseCredentials(value: string | Record<string, unknown>): Credentials {
  let candidate: unknown = value;
  if (typeof value === 'string') {
    try {
      candidate = JSON.parse(value);
    } catch (err) {
      throw new ConnectionError('Credentials are not valid JSON', err);
    }
  }
  const result = credentialsSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConnectionError(`Invalid credentials: ${describeIssues(result.error)}`, result.error);
  }
  return result.data;
}

/**
 * Reads connection options from the environment:
 * DATASTORE_PROJECT_ID (or GOOGLE_CLOUD_PROJECT), DATASTORE_DATABASE_ID,
 * DATASTORE_NAMESPACE and DATASTORE_CREDENTIALS_JSON.
 */
export function loadConnectionOptions(env: NodeJS.ProcessEnv = process.env): ConnectionOptions {
  const result = connectionOptionsSchema.safeParse({
    projectId: env['DATASTORE_PROJECT_ID'] ?? env['GOOGLE_CLOUD_PROJECT'],
    databaseId: env['DATASTORE_DATABASE_ID'],
    namespace: env['DATASTORE_NAMESPACE'],
    credentials: env['DATASTORE_CREDENTIALS_JSON'] || undefined,
  });
  if (!result.success) {
    throw new ConnectionError(`Invalid Datastore configuration: ${describeIssues(result.error)}`, result.error);
  }
  return result.data;
}
