// Caller identity and row-visibility scope

import type { Row, TableName } from './entities.js';

export type Role = 'customer' | 'business';

export const ROLES: readonly Role[] = ['customer', 'business'];

export type AccessScope =
  | { readonly role: 'business'; readonly identity: string }
  | { readonly role: 'customer'; readonly identity: string; readonly subjectId: string };

/** Row-level predicate composed into every table read of the execution engine */
export interface ScopeFilter {
  readonly scope: AccessScope;
  admits(table: TableName, row: Row): boolean;
}

export function isRole(value: string): value is Role {
  return (ROLES as readonly string[]).includes(value);
}
