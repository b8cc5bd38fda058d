/**
 * Endpoint Definitions
 *
 * The static table describing every endpoint the extractor knows about:
 * API paths, key fields, list columns to explode, parent/child relations
 * and which field (if any) carries the date filter. Loaded from YAML.
 *
 * @module config/endpoint-definitions
 */

import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { AppError, ErrorCode, errorMessage, fromZodError } from '../utils/errors';

export interface EndpointSpec {
  /** Endpoint (and output table) name */
  name: string;
  /** API path of the collection, relative to the API root */
  endpoint: string;
  /** Path segment used when fetched under a parent: `<parent>/<id>/<childEndpoint>` */
  childEndpoint: string;
  /** Explicit field selection; empty means every field */
  fields: string[];
  parentTable?: string;
  /** Column of the parent's output holding the identifiers to fan out over */
  parentIdField: string;
  primaryKeys: string[];
  secondaryKeys: string[];
  listColumns: string[];
  listOfDictsColumns: string[];
  /** Field the date bounds apply to; endpoints without one are never date-filtered */
  dateFilterField?: string;
  /** Raw field reported when a record of the identity source is rejected */
  identifierField: string;
}

export interface EndpointDefinitions {
  endpoints: Map<string, EndpointSpec>;
  /** Endpoint whose record validity gates the identifiers its dependents may use */
  identitySource?: string;
  /** Extra singular prefix stripped from identity-source identifiers */
  identityAliasPrefix?: string;
}

const stringList = z.array(z.string().min(1)).default([]);

const endpointSchema = z.object({
  endpoint: z.string().min(1).optional(),
  child_endpoint: z.string().min(1).optional(),
  fields: stringList,
  parent_table: z.string().min(1).optional(),
  parent_id_field: z.string().min(1).default('id'),
  primary_keys: stringList,
  secondary_keys: stringList,
  list_columns: stringList,
  list_of_dicts_columns: stringList,
  date_filter_field: z.string().min(1).optional(),
  identifier_field: z.string().min(1).default('name')
});

const definitionsSchema = z.object({
  identity_source: z.string().min(1).optional(),
  identity_alias_prefix: z.string().min(1).optional(),
  endpoints: z.record(z.string().min(1), endpointSchema.nullable().transform((value) => value ?? endpointSchema.parse({})))
});

export function parseEndpointDefinitions(input: unknown, source = 'endpoint definitions'): EndpointDefinitions {
  const result = definitionsSchema.safeParse(input);
  if (!result.success) {
    throw fromZodError(result.error, source);
  }

  const endpoints = new Map<string, EndpointSpec>();
  for (const [name, raw] of Object.entries(result.data.endpoints)) {
    endpoints.set(name, {
      name,
      endpoint: raw.endpoint ?? name,
      childEndpoint: raw.child_endpoint ?? name,
      fields: raw.fields,
      parentTable: raw.parent_table,
      parentIdField: raw.parent_id_field,
      primaryKeys: raw.primary_keys,
      secondaryKeys: raw.secondary_keys,
      listColumns: raw.list_columns,
      listOfDictsColumns: raw.list_of_dicts_columns,
      dateFilterField: raw.date_filter_field,
      identifierField: raw.identifier_field
    });
  }

  const { identity_source: identitySource } = result.data;
  if (identitySource && !endpoints.has(identitySource)) {
    throw new AppError(
      ErrorCode.CONFIGURATION_ERROR,
      `identity_source "${identitySource}" is not a defined endpoint in ${source}`
    );
  }

  for (const spec of endpoints.values()) {
    if (spec.parentTable && !endpoints.has(spec.parentTable)) {
      throw new AppError(
        ErrorCode.CONFIGURATION_ERROR,
        `Endpoint "${spec.name}" names unknown parent_table "${spec.parentTable}" in ${source}`
      );
    }
  }

  assertNoParentCycles(endpoints, source);

  return {
    endpoints,
    identitySource,
    identityAliasPrefix: result.data.identity_alias_prefix
  };
}

function assertNoParentCycles(endpoints: Map<string, EndpointSpec>, source: string): void {
  for (const spec of endpoints.values()) {
    const seen = new Set<string>([spec.name]);
    let parent = spec.parentTable;
    while (parent) {
      if (seen.has(parent)) {
        throw new AppError(
          ErrorCode.CONFIGURATION_ERROR,
          `Parent cycle through "${spec.name}" in ${source}`
        );
      }
      seen.add(parent);
      parent = endpoints.get(parent)?.parentTable;
    }
  }
}

export async function loadEndpointDefinitions(definitionsPath: string): Promise<EndpointDefinitions> {
  logger.debug('Loading endpoint definitions', { definitionsPath });

  let raw: unknown;
  try {
    raw = parseYaml(await readFile(definitionsPath, 'utf-8'));
  } catch (error) {
    throw new AppError(
      ErrorCode.CONFIGURATION_ERROR,
      `Cannot load endpoint definitions from ${definitionsPath}: ${errorMessage(error)}`
    );
  }

  const definitions = parseEndpointDefinitions(raw, definitionsPath);

  logger.info('Endpoint definitions loaded', {
    count: definitions.endpoints.size,
    identitySource: definitions.identitySource
  });

  return definitions;
}

/**
 * Apply per-run field selections from the configuration on top of the static table
 */
export function withConfiguredFields(
  definitions: EndpointDefinitions,
  fields: Record<string, string[]>
): EndpointDefinitions {
  const endpoints = new Map<string, EndpointSpec>();
  for (const [name, spec] of definitions.endpoints) {
    const selected = fields[name];
    endpoints.set(name, selected ? { ...spec, fields: selected } : spec);
  }
  return { ...definitions, endpoints };
}
