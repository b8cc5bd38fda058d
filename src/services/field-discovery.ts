import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import type { EndpointDefinitions } from '../config/endpoint-definitions';
import type { ApiClient } from '../core/api-client';

/**
 * Sorted field names of the first record of each endpoint. An endpoint that
 * fails or returns nothing maps to an empty list.
 */
export async function discoverFields(
  api: ApiClient,
  definitions: EndpointDefinitions,
  endpoints: string[]
): Promise<Record<string, string[]>> {
  const fields: Record<string, string[]> = {};

  for (const name of endpoints) {
    const spec = definitions.endpoints.get(name);
    if (!spec) {
      logger.warn('Unknown endpoint skipped', { endpoint: name });
      continue;
    }

    try {
      const page = await api.fetchPage({ path: spec.endpoint, offset: 0, limit: 1 });
      const [first] = page.records;
      fields[name] = first ? Object.keys(first).sort() : [];
    } catch (error) {
      logger.warn('Failed to list fields', { endpoint: name, error: errorMessage(error) });
      fields[name] = [];
    }
  }

  return fields;
}
