/**
 * Phase Scheduler
 *
 * Splits endpoints into two phases separated by a full barrier and runs each
 * phase under the endpoint limiter. Phase 2 holds the identity source and
 * every dependent endpoint; a dependent whose parent runs in the same phase
 * waits for that parent before it takes an endpoint slot.
 *
 * @module scheduler
 */

import { logger } from '../utils/logger';
import { AppError, ErrorCode, errorMessage } from '../utils/errors';
import { Semaphore } from '../utils/semaphore';

export interface ExtractionPlan {
  phase1: string[];
  phase2: string[];
}

export type ParentLookup = (endpoint: string) => string | undefined;

/**
 * True when `endpoint` is the identity source or descends from it
 */
function inIdentityFamily(endpoint: string, parentOf: ParentLookup, identitySource?: string): boolean {
  if (!identitySource) {
    return false;
  }

  const seen = new Set<string>();
  let current: string | undefined = endpoint;
  while (current && !seen.has(current)) {
    if (current === identitySource) {
      return true;
    }
    seen.add(current);
    current = parentOf(current);
  }
  return false;
}

export function planPhases(endpoints: string[], parentOf: ParentLookup, identitySource?: string): ExtractionPlan {
  const plan: ExtractionPlan = { phase1: [], phase2: [] };

  for (const endpoint of endpoints) {
    if (parentOf(endpoint) !== undefined || inIdentityFamily(endpoint, parentOf, identitySource)) {
      plan.phase2.push(endpoint);
    } else {
      plan.phase1.push(endpoint);
    }
  }

  return plan;
}

export class PhaseFailedError extends AppError {
  constructor(
    public readonly phase: number,
    public readonly failures: Map<string, unknown>
  ) {
    const summary = [...failures.entries()].map(([endpoint, reason]) => `${endpoint} (${errorMessage(reason)})`);
    super(ErrorCode.EXTRACTION_ERROR, `Extraction phase ${phase} failed: ${summary.join('; ')}`, {
      endpoints: [...failures.keys()]
    });
    this.name = 'PhaseFailedError';
  }
}

export class PhaseScheduler<T> {
  constructor(private readonly endpointLimiter: Semaphore) {}

  /**
   * Run one phase to completion. Every task settles before this resolves,
   * whether or not a sibling failed.
   */
  async runPhase(
    endpoints: string[],
    parentOf: ParentLookup,
    task: (endpoint: string) => Promise<T>
  ): Promise<Map<string, PromiseSettledResult<T>>> {
    const running = new Map<string, Promise<T>>();

    for (const endpoint of this.parentsFirst(endpoints, parentOf)) {
      const parent = parentOf(endpoint);
      const parentTask = parent !== undefined ? running.get(parent) : undefined;

      running.set(endpoint, this.schedule(endpoint, parent, parentTask, task));
    }

    const ordered = [...running.entries()];
    const settled = await Promise.allSettled(ordered.map(([, promise]) => promise));

    return new Map(ordered.map(([endpoint], index) => [endpoint, settled[index]]));
  }

  /**
   * Phase 1, barrier, phase 2. A failure in phase 1 stops the run before phase 2.
   */
  async run(
    plan: ExtractionPlan,
    parentOf: ParentLookup,
    task: (endpoint: string) => Promise<T>
  ): Promise<Map<string, T>> {
    const results = new Map<string, T>();

    for (const [index, endpoints] of [plan.phase1, plan.phase2].entries()) {
      if (endpoints.length === 0) {
        continue;
      }

      const phase = index + 1;
      logger.info('Starting extraction phase', { phase, endpoints });

      const settled = await this.runPhase(endpoints, parentOf, task);
      const failures = new Map<string, unknown>();

      for (const [endpoint, result] of settled) {
        if (result.status === 'fulfilled') {
          results.set(endpoint, result.value);
        } else {
          failures.set(endpoint, result.reason);
        }
      }

      if (failures.size > 0) {
        throw new PhaseFailedError(phase, failures);
      }

      logger.info('Extraction phase complete', { phase });
    }

    return results;
  }

  private async schedule(
    endpoint: string,
    parent: string | undefined,
    parentTask: Promise<T> | undefined,
    task: (endpoint: string) => Promise<T>
  ): Promise<T> {
    if (parentTask) {
      try {
        await parentTask;
      } catch {
        throw new Error(`Parent endpoint "${parent}" of "${endpoint}" failed`);
      }
    }

    return this.endpointLimiter.use(() => task(endpoint));
  }

  /**
   * Order so that every parent in the list comes before its children
   */
  private parentsFirst(endpoints: string[], parentOf: ParentLookup): string[] {
    const members = new Set(endpoints);
    const ordered: string[] = [];
    const placed = new Set<string>();

    const place = (endpoint: string): void => {
      if (placed.has(endpoint)) {
        return;
      }
      placed.add(endpoint);
      const parent = parentOf(endpoint);
      if (parent !== undefined && members.has(parent)) {
        place(parent);
      }
      ordered.push(endpoint);
    };

    endpoints.forEach(place);
    return ordered;
  }
}
