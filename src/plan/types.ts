/**
 * Plan, execution and rendering types
 */

import type { ApiLogger } from '../api/logger.js';
import type { ReconcileError } from '../errors.js';
import type { Change, ResourceKind, ShorthandLink } from '../reconcilers/types.js';

// =============================================================================
// Plan
// =============================================================================

export interface KindSummary {
  create: number;
  update: number;
  none: number;
}

export type PlanSummary = Record<ResourceKind, KindSummary>;

/**
 * Ordered changes: upstreams with their targets, then services, then routes
 */
export interface Plan {
  changes: Change[];
  /** Route to synthesized resources; used only for rendering */
  shorthand: ShorthandLink[];
  summary: PlanSummary;
}

// =============================================================================
// Execution
// =============================================================================

export interface ApplyOptions {
  /** Allow updates of resources that already exist */
  overwrite: boolean;
  /** Receives one debug entry per mutating call */
  logger?: ApiLogger;
}

export type ExecutionStatus = 'created' | 'updated' | 'skipped' | 'unchanged' | 'failed';

export interface ExecutionResult {
  kind: ResourceKind;
  name: string;
  status: ExecutionStatus;
  /** Error message when status is failed */
  error?: string;
}

/**
 * An update withheld because overwrite was not enabled
 */
export interface ConflictSkip {
  kind: ResourceKind;
  name: string;
  /** Names of the differing fields */
  fields: string[];
}

export interface ApplyResult {
  /** One entry per change that was reached before any failure */
  results: ExecutionResult[];
  summary: {
    created: number;
    updated: number;
    skipped: number;
    unchanged: number;
    failed: number;
  };
  skips: ConflictSkip[];
  /** Error messages */
  errors: string[];
  success: boolean;
  /** The fatal error that aborted execution */
  error?: ReconcileError;
}

// =============================================================================
// Rendering
// =============================================================================

export interface RenderOptions {
  /** Bracketed tags and plain separators instead of emoji and box drawing */
  ascii?: boolean;
  /** Colour output (default: chalk's detected level) */
  color?: boolean;
  /** Hide unchanged entries that have no changed children */
  compact?: boolean;
  /** Show field-level diffs under updated entries */
  showDiff?: boolean;
  /** When false, a hint about --overwrite follows the summary if anything would be updated */
  overwrite?: boolean;
}
