import { describe, it, expect } from 'vitest';
import { loadConnectionOptions, parseCredentials } from '../../src/config.js';
import { ConnectionError } from '../../src/errors.js';

describe('loadConnectionOptions', () => {
  it('reads all variables', () => {
    const options = loadConnectionOptions({
      DATASTORE_PROJECT_ID: 'test-project',
      DATASTORE_DATABASE_ID: 'orders',
      DATASTORE_NAMESPACE: 'tenant-a',
      DATASTORE_CREDENTIALS_JSON: '{"client_email":"svc@test-project.example","private_key":"test-secret"}',
    });
    expect(options).toEqual({
      projectId: 'test-project',
      databaseId: 'orders',
      namespace: 'tenant-a',
      credentials: '{"client_email":"svc@test-project.example","private_key":"test-secret"}',
    });
  });

  it('falls back to GOOGLE_CLOUD_PROJECT', () => {
    expect(loadConnectionOptions({ GOOGLE_CLOUD_PROJECT: 'fallback-project' }).projectId).toBe('fallback-project');
  });

  it('prefers DATASTORE_PROJECT_ID', () => {
    const options = loadConnectionOptions({ DATASTORE_PROJECT_ID: 'primary', GOOGLE_CLOUD_PROJECT: 'fallback' });
    expect(options.projectId).toBe('primary');
  });

  it('treats empty credentials as absent', () => {
    const options = loadConnectionOptions({ DATASTORE_PROJECT_ID: 'test-project', DATASTORE_CREDENTIALS_JSON: '' });
    expect(options.credentials).toBeUndefined();
  });

  it('throws ConnectionError without a project id', () => {
    expect(() => loadConnectionOptions({})).toThrow(ConnectionError);
    expect(() => loadConnectionOptions({})).toThrow(/^Invalid Datastore configuration: projectId: /);
  });
});

describe('parseCredentials', () => {
  it('parses JSON text', () => {
    expect(parseCredentials('{"client_email":"svc@test-project.example","private_key":"test-secret","type":"service_account"}'))
      .toEqual({ client_email: 'svc@test-project.example', private_key: 'test-secret' });
  });

  it('accepts an object', () => {
    expect(parseCredentials({ client_email: 'svc@test-project.example', private_key: 'test-secret' }))
      .toEqual({ client_email: 'svc@test-project.example', private_key: 'test-secret' });
  });

  it('rejects invalid JSON', () => {
    expect(() => parseCredentials('{oops')).toThrow('Credentials are not valid JSON');
  });

  it('rejects missing fields', () => {
    expect(() => parseCredentials({ client_email: 'svc@test-project.example' })).toThrow(
      /^Invalid credentials: private_key: /,
    );
  });
});
