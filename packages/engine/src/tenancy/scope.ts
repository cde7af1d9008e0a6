import { ValidationError } from '../errors.js';
import { stableId } from '../utils/helpers.js';
import { And, Eq, In, Or, type FilterExpr } from '../vector/expr.js';

export interface TenantScope {
  workspaceId: string;
  /** Omitted: only records shared across the workspace are visible. */
  agentId?: string;
}

export function validateScope(scope: TenantScope): void {
  if (!scope.workspaceId || !scope.workspaceId.trim()) {
    throw new ValidationError('Tenant scope requires a workspaceId');
  }
  if (scope.agentId !== undefined && !scope.agentId.trim()) {
    throw new ValidationError('agentId must be omitted rather than empty');
  }
}

/**
 * Collection name for a workspace: `<base>_<slug>`. When the slug loses information
 * (case, punctuation) a hash suffix keeps distinct workspaces apart.
 */
export function collectionNameFor(base: string, workspaceId: string): string {
  const slug = workspaceId.toLowerCase().replace(/[^a-z0-9_]+/g, '_').replace(/^_+|_+$/g, '').slice(0, 48);
  const suffix = slug === workspaceId ? '' : `_${stableId(workspaceId).replace(/-/g, '').slice(0, 8)}`;
  return `${base}_${slug || 'ws'}${suffix}`;
}

/**
 * Records a scope may see: its workspace, and within it either shared records only
 * (no agent) or the agent's own plus shared records.
 */
export function tenantFilter(scope: TenantScope): FilterExpr {
  validateScope(scope);
  return And([
    Eq('workspace_id', scope.workspaceId),
    scope.agentId === undefined ? Eq('agent_id', '') : In('agent_id', [scope.agentId, '']),
  ]);
}

/** Stable resource id: the same uri ingested under the same scope always maps here. */
export function resourceIdFor(scope: TenantScope, uri: string): string {
  return stableId(`${scope.workspaceId}\u0000${scope.agentId ?? ''}\u0000${uri}`);
}

export function recordIdFor(resourceId: string, level: number): string {
  return stableId(`${resourceId}\u0000L${level}`);
}

function trimUri(uri: string): string {
  return uri.endsWith('://') ? uri : uri.replace(/\/+$/, '');
}

/** Directory a uri sits in: `mem://notes/cats.md` → `mem://notes`. */
export function parentUri(uri: string): string {
  const trimmed = trimUri(uri);
  const schemeEnd = trimmed.indexOf('://');
  const root = schemeEnd >= 0 ? schemeEnd + 3 : 0;
  const cut = trimmed.lastIndexOf('/');
  return cut >= root ? trimmed.slice(0, cut) : trimmed.slice(0, root);
}

/** Resources that are one of `targets` or sit directly inside one of them. */
export function targetFilter(targets: readonly string[]): FilterExpr | undefined {
  if (targets.length === 0) return undefined;
  if (targets.some(t => !t.trim())) throw new ValidationError('targetUris must not contain empty entries');
  return Or(targets.map(trimUri).flatMap(t => [Eq('uri', t), Eq('parent_uri', t)]));
}
