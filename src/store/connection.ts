import { Datastore } from '@google-cloud/datastore';
import type { DatastoreOptions } from '@google-cloud/datastore';
import type { QuerySpec } from '../query/types.js';
import type { DatastoreGateway, EntityKey, ErrorContext, QueryRun, StoredEntity } from '../types.js';
import { ConnectionError } from '../errors.js';
import { connectionOptionsSchema, describeIssues, parseCredentials } from '../config.js';
import type { ConnectionOptions } from '../config.js';
import { compileCountQuery, compileQuery, fromNativeKey, toNativeKey } from '../query/compiler.js';
import { mapEntity } from './entity-mapper.js';

export interface DatastoreConnectionConfig {
  client: Datastore;
  projectId: string;
  databaseId?: string;
  namespace?: string;
  onError?: (context: ErrorContext, error: unknown) => void;
}

export function defaultErrorSink(context: ErrorContext, error: unknown): void {
  console.error(`${context.store} ${context.kind} ${context.operation}-error`, error);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Connection handle over a Cloud Datastore client. Safe to share between
 * any number of builders; the client pools its own channels.
 */
export class DatastoreConnection implements DatastoreGateway {
  readonly client: Datastore;
  readonly projectId: string;
  readonly databaseId: string;
  readonly namespace: string | undefined;
  private readonly onError: (context: ErrorContext, error: unknown) => void;

  constructor(config: DatastoreConnectionConfig) {
    this.client = config.client;
    this.projectId = config.projectId;
    this.databaseId = config.databaseId ?? '';
    this.namespace = config.namespace;
    this.onError = config.onError ?? defaultErrorSink;
  }

  async runQuery(spec: QuerySpec): Promise<StoredEntity[]> {
    const [entities] = await this.client.runQuery(compileQuery(this.client, spec));
    return entities.map((raw: unknown) => mapEntity(this.client.KEY, raw));
  }

  iterateQuery(spec: QuerySpec, signal?: AbortSignal): QueryRun {
    const client = this.client;
    let endCursor = '';
    return {
      endCursor: () => endCursor,
      async *[Symbol.asyncIterator]() {
        const stream = client.runQueryStream(compileQuery(client, spec));
        const onAbort = () => stream.destroy();
        signal?.addEventListener('abort', onAbort, { once: true });
        stream.on('info', (info: unknown) => {
          if (isRecord(info) && typeof info['endCursor'] === 'string') {
            endCursor = info['endCursor'];
          }
        });
        try {
          for await (const chunk of stream) {
            yield mapEntity(client.KEY, chunk);
          }
        } finally {
          signal?.removeEventListener('abort', onAbort);
        }
      },
    };
  }

  async runCount(spec: QuerySpec, alias: string): Promise<Record<string, unknown>> {
    const [results] = await this.client.runAggregationQuery(compileCountQuery(this.client, spec, alias));
    const row: unknown = Array.isArray(results) ? results[0] : undefined;
    return isRecord(row) ? row : {};
  }

  async lookup(keys: EntityKey[]): Promise<StoredEntity[]> {
    const [found] = await this.client.get(keys.map((key) => toNativeKey(this.client, key)));
    const list: unknown[] = Array.isArray(found) ? found : [found];
    return list
      .filter((raw) => raw !== undefined && raw !== null)
      .map((raw) => mapEntity(this.client.KEY, raw));
  }

  async upsert(entities: StoredEntity[]): Promise<void> {
    await this.client.upsert(
      entities.map((entity) => ({ key: toNativeKey(this.client, entity.key), data: entity.data })),
    );
  }

  async insert(entity: StoredEntity): Promise<EntityKey> {
    const key = toNativeKey(this.client, entity.key);
    // The client fills in the allocated id on commit.
    await this.client.insert({ key, data: entity.data });
    return fromNativeKey(key);
  }

  async delete(keys: EntityKey[]): Promise<void> {
    await this.client.delete(keys.map((key) => toNativeKey(this.client, key)));
  }

  reportError(context: ErrorContext, error: unknown): void {
    this.onError(context, error);
  }
}

/**
 * Opens a connection. Without credentials the client falls back to
 * application-default credentials (GOOGLE_APPLICATION_CREDENTIALS etc.).
 *
 * @example
 * const db = connect({ projectId: 'my-project', databaseId: 'orders' });
 */
export function connect(options: ConnectionOptions): DatastoreConnection {
  const parsed = connectionOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConnectionError(`Invalid Datastore connection options: ${describeIssues(parsed.error)}`, parsed.error);
  }
  const { projectId, databaseId, namespace, credentials } = parsed.data;

  const clientOptions: DatastoreOptions = { projectId };
  if (databaseId) clientOptions.databaseId = databaseId;
  if (namespace !== undefined) clientOptions.namespace = namespace;
  // Empty text means application-default credentials, as in loadConnectionOptions.
  if (credentials !== undefined && credentials !== '') clientOptions.credentials = parseCredentials(credentials);

  let client: Datastore;
  try {
    client = new Datastore(clientOptions);
  } catch (err) {
    throw new ConnectionError(`Failed to create Datastore client for project "${projectId}": ${String(err)}`, err);
  }

  return new DatastoreConnection({
    client,
    projectId,
    ...(databaseId !== undefined ? { databaseId } : {}),
    ...(namespace !== undefined ? { namespace } : {}),
    ...(options.onError !== undefined ? { onError: options.onError } : {}),
  });
}
