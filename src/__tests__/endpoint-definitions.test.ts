import { describe, it, expect, vi } from 'vitest';
import {
  loadEndpointDefinitions,
  parseEndpointDefinitions,
  withConfiguredFields,
} from '../config/endpoint-definitions';
import { config } from '../config/env';

vi.mock('../utils/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe('parseEndpointDefinitions', () => {
  it('fills defaults for sparse entries', () => {
    const definitions = parseEndpointDefinitions({
      endpoints: {
        users: null,
        tags: { parent_table: 'users', child_endpoint: 'tags', primary_keys: ['name'] },
      },
    });

    expect(definitions.endpoints.get('users')).toEqual({
      name: 'users',
      endpoint: 'users',
      childEndpoint: 'users',
      fields: [],
      parentTable: undefined,
      parentIdField: 'id',
      primaryKeys: [],
      secondaryKeys: [],
      listColumns: [],
      listOfDictsColumns: [],
      dateFilterField: undefined,
      identifierField: 'name',
    });
    expect(definitions.endpoints.get('tags')).toMatchObject({ parentTable: 'users', childEndpoint: 'tags' });
    expect(definitions.identitySource).toBeUndefined();
  });

  it('rejects an unknown identity source', () => {
    expect(() => parseEndpointDefinitions({ identity_source: 'calls', endpoints: { users: null } }, 'defs.yaml')).toThrow(
      'identity_source "calls" is not a defined endpoint in defs.yaml'
    );
  });

  it('rejects an unknown parent', () => {
    expect(() =>
      parseEndpointDefinitions({ endpoints: { tags: { parent_table: 'users' } } }, 'defs.yaml')
    ).toThrow('Endpoint "tags" names unknown parent_table "users" in defs.yaml');
  });

  it('rejects parent cycles', () => {
    expect(() =>
      parseEndpointDefinitions({
        endpoints: { a: { parent_table: 'b' }, b: { parent_table: 'a' } },
      })
    ).toThrow('Parent cycle through "a" in endpoint definitions');
  });
});

describe('bundled endpoint table', () => {
  it('loads and keeps activity dependents under the identity source', async () => {
    const definitions = await loadEndpointDefinitions(config.paths.definitionsPath);

    expect(definitions.identitySource).toBe('activities');
    expect(definitions.identityAliasPrefix).toBe('activity_');
    expect(definitions.endpoints.get('activityTags')).toMatchObject({
      parentTable: 'activities',
      childEndpoint: 'tags',
      parentIdField: 'name',
    });
    expect(definitions.endpoints.get('users')?.dateFilterField).toBeUndefined();
    expect(definitions.endpoints.get('tickets')?.dateFilterField).toBe('edited');
  });
});

describe('withConfiguredFields', () => {
  it('overrides fields for the configured endpoints only', () => {
    const definitions = parseEndpointDefinitions({ endpoints: { users: null, queues: { fields: ['name'] } } });

    const merged = withConfiguredFields(definitions, { users: ['name', 'title'] });

    expect(merged.endpoints.get('users')?.fields).toEqual(['name', 'title']);
    expect(merged.endpoints.get('queues')?.fields).toEqual(['name']);
  });
});
