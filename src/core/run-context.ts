/**
 * Per-run state shared between extraction phases.
 *
 * The identity-source task fills the invalid-identifier set during phase 1/2
 * and the dependent resolvers read it afterwards; nothing else is shared.
 */

import { generateRunId } from '../utils/logger';

export interface RunContextOptions {
  /** Short server name; prefixes output tables and (possibly) stored identifiers */
  server: string;
  identitySource?: string;
  identityAliasPrefix?: string;
  runId?: string;
}

export class RunContext {
  readonly runId: string;
  readonly server: string;
  readonly identitySource?: string;
  readonly identityAliasPrefix?: string;
  private readonly invalidIdentifiers = new Set<string>();

  constructor(options: RunContextOptions) {
    this.runId = options.runId ?? generateRunId();
    this.server = options.server;
    this.identitySource = options.identitySource;
    this.identityAliasPrefix = options.identityAliasPrefix;
  }

  tableName(endpoint: string): string {
    return `${this.server}_${endpoint}`;
  }

  isIdentitySource(endpoint: string): boolean {
    return this.identitySource !== undefined && endpoint === this.identitySource;
  }

  addInvalidIdentifiers(identifiers: Iterable<string>): void {
    for (const identifier of identifiers) {
      this.invalidIdentifiers.add(identifier);
    }
  }

  isInvalidIdentifier(identifier: string): boolean {
    return this.invalidIdentifiers.has(identifier);
  }

  get invalidIdentifierCount(): number {
    return this.invalidIdentifiers.size;
  }

  invalidIdentifierList(): string[] {
    return [...this.invalidIdentifiers];
  }
}
