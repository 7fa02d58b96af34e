/**
 * Hierarchical plan rendering for dry runs
 *
 * Targets nest under their upstream, resources synthesized for a service
 * or a shorthand route nest under their owner instead of appearing at the
 * top level. Rendering never changes the plan.
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type {
  Action,
  Change,
  DesiredService,
  FieldChange,
  FieldValue,
  ResourceKind,
  ResourceOwner,
  TargetChange,
  UpstreamChange,
} from '../reconcilers/types.js';
import type { Plan, RenderOptions } from './types.js';

const SEPARATOR_WIDTH = 40;

const ICONS: Record<ResourceKind, { emoji: string; ascii: string }> = {
  upstream: { emoji: '🌐', ascii: '[U]' },
  target: { emoji: '🎯', ascii: '[T]' },
  service: { emoji: '🧩', ascii: '[S]' },
  route: { emoji: '🛣️', ascii: '[R]' },
};

const ACTION_LABELS: Record<Action, { emoji: string; ascii: string }> = {
  create: { emoji: 'create ✨', ascii: 'create' },
  update: { emoji: 'update ♻️', ascii: 'update' },
  none: { emoji: 'no change', ascii: 'no change' },
};

export const OVERWRITE_HINT = 'Existing resources are not updated unless --overwrite is given.';

type Node =
  | { type: 'change'; change: Change; children: Node[] }
  | { type: 'group'; label: string; children: Node[] };

// =============================================================================
// Tree building
// =============================================================================

function sameOwner(a: ResourceOwner | undefined, b: ResourceOwner | undefined): boolean {
  return a?.kind === b?.kind && a?.name === b?.name;
}

function buildTree(plan: Plan): { upstreams: Node[]; services: Node[]; routes: Node[] } {
  const upstreams: UpstreamChange[] = [];
  const targets: TargetChange[] = [];
  const services = new Map<string, Change>();
  const routes: Change[] = [];
  for (const change of plan.changes) {
    if (change.kind === 'upstream') upstreams.push(change);
    else if (change.kind === 'target') targets.push(change);
    else if (change.kind === 'service') services.set(change.name, change);
    else routes.push(change);
  }

  const leaf = (change: Change): Node => ({ type: 'change', change, children: [] });
  const targetsOf = (upstream: string, owner: ResourceOwner | undefined): Node[] =>
    targets
      .filter((target) => target.desired.upstream === upstream && sameOwner(target.owner, owner))
      .map(leaf);

  // Upstream and targets a service or route brought into existence
  const ownedBy = (service: DesiredService, owner: ResourceOwner): Node[] => {
    if (service.backend.mode !== 'upstream') return [];
    const upstreamName = service.backend.upstream;
    const upstream = upstreams.find((change) => change.name === upstreamName);
    if (upstream && sameOwner(upstream.owner, owner)) {
      return [{ type: 'change', change: upstream, children: targetsOf(upstreamName, owner) }];
    }
    const owned = targetsOf(upstreamName, owner);
    return owned.length > 0 ? [{ type: 'group', label: `Targets (Upstream ${upstreamName}):`, children: owned }] : [];
  };

  const serviceNode = (change: Change, owner: ResourceOwner): Node => ({
    type: 'change',
    change,
    children: change.kind === 'service' ? ownedBy(change.desired, owner) : [],
  });

  return {
    upstreams: upstreams
      .filter((change) => change.owner === undefined)
      .map((change): Node => ({ type: 'change', change, children: targetsOf(change.name, undefined) })),
    services: [...services.values()]
      .filter((change) => change.owner?.kind !== 'route')
      .map((change) => serviceNode(change, { kind: 'service', name: change.name })),
    routes: routes.map((change): Node => {
      const link = plan.shorthand.find((entry) => entry.route === change.name);
      const service = link ? services.get(link.service) : undefined;
      return {
        type: 'change',
        change,
        children: service ? [serviceNode(service, { kind: 'route', name: change.name })] : [],
      };
    }),
  };
}

// =============================================================================
// Formatting
// =============================================================================

function formatFieldValue(value: FieldValue | undefined): string {
  if (value === undefined || value === '') return '(none)';
  if (Array.isArray(value)) return `[${value.join(', ')}]`;
  return String(value);
}

/**
 * Lines describing one field change; set fields list removed then added members
 */
export function formatFieldChange(change: FieldChange, c: ChalkInstance = chalk): string[] {
  if (change.added !== undefined || change.removed !== undefined) {
    return [
      `${change.field}:`,
      ...(change.removed ?? []).map((item) => `  ${c.red(`- ${item}`)}`),
      ...(change.added ?? []).map((item) => `  ${c.green(`+ ${item}`)}`),
    ];
  }
  return [
    `${change.field}: ${c.red(formatFieldValue(change.oldValue))} -> ${c.green(formatFieldValue(change.newValue))}`,
  ];
}

function displayName(change: Change): string {
  return change.kind === 'target' ? change.desired.target : change.name;
}

/**
 * Render the plan as lines of text
 */
export function renderPlan(plan: Plan, options: RenderOptions = {}): string[] {
  const c = new Chalk({ level: options.color === false ? 0 : chalk.level });
  const style = options.ascii ? 'ascii' : 'emoji';
  const actionColor: Record<Action, ChalkInstance> = { create: c.green, update: c.yellow, none: c.gray };
  const separator = (options.ascii ? '=' : '─').repeat(SEPARATOR_WIDTH);

  const visible = (node: Node): boolean => {
    if (node.type === 'group') return node.children.some(visible);
    return !options.compact || node.change.action !== 'none' || node.children.some(visible);
  };

  const lines: string[] = [];
  const renderNode = (node: Node, level: number): void => {
    const indent = '  '.repeat(level);
    if (node.type === 'group') {
      lines.push(`${indent}${node.label}`);
    } else {
      const { change } = node;
      const label = actionColor[change.action](`(${ACTION_LABELS[change.action][style]})`);
      lines.push(`${indent}${ICONS[change.kind][style]} ${c.bold(displayName(change))} ${label}`);
      if (options.showDiff && change.action === 'update') {
        for (const field of change.fields) {
          lines.push(...formatFieldChange(field, c).map((line) => `${indent}    ${line}`));
        }
      }
    }
    for (const child of node.children.filter(visible)) {
      renderNode(child, level + 1);
    }
  };

  lines.push(c.bold('Change plan:'), separator);

  const tree = buildTree(plan);
  const sections: [string, Node[]][] = [
    ['Upstreams', tree.upstreams],
    ['Services', tree.services],
    ['Routes', tree.routes],
  ];
  for (const [title, nodes] of sections) {
    const shown = nodes.filter(visible);
    if (shown.length === 0) continue;
    lines.push(c.bold(`${title}:`));
    shown.forEach((node) => renderNode(node, 1));
  }

  lines.push(separator, c.bold('Summary:'));
  const totals: [string, ResourceKind][] = [
    ['Upstreams', 'upstream'],
    ['Targets', 'target'],
    ['Services', 'service'],
    ['Routes', 'route'],
  ];
  for (const [title, kind] of totals) {
    const counts = plan.summary[kind];
    lines.push(`  ${title}: create ${counts.create}, update ${counts.update}, unchanged ${counts.none}`);
  }

  const updates = totals.reduce((sum, [, kind]) => sum + plan.summary[kind].update, 0);
  if (!options.overwrite && updates > 0) {
    lines.push(c.yellow(OVERWRITE_HINT));
  }

  return lines;
}
