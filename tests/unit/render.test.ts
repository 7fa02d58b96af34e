/**
 * Unit Tests: Plan Rendering
 *
 * Tests the nesting of synthesized resources under their owners, compact
 * mode, field diffs, the summary and the overwrite hint.
 *
 * @see src/plan/render.ts
 */

import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import { buildPlan, formatFieldChange, OVERWRITE_HINT, renderPlan } from '../../src/plan/index.js';
import { loadDocument } from '../../src/spec/normalize.js';
import { FakeGateway } from '../helpers/fake-gateway.js';

const NESTED_DOCUMENT = `
services:
  - name: orders
    upstream: orders-pool
    targets:
      - target: o1:80
routes:
  - name: orders-route
    service: orders
    paths: [/orders]
  - name: search
    paths: [/search]
    backend:
      targets:
        - target: s1:80
`;

const POOL_DOCUMENT = `
upstreams:
  - name: pool
    targets:
      - target: a:80
        weight: 20
      - target: b:80
`;

describe('renderPlan', () => {
  it('nests owned upstreams and targets under their service or route', async () => {
    const plan = await buildPlan(new FakeGateway(), loadDocument(NESTED_DOCUMENT).document);

    const lines = renderPlan(plan, { ascii: true, color: false });

    expect(lines).toEqual([
      'Change plan:',
      '='.repeat(40),
      'Services:',
      '  [S] orders (create)',
      '    [U] orders-pool (create)',
      '      [T] o1:80 (create)',
      'Routes:',
      '  [R] orders-route (create)',
      '  [R] search (create)',
      '    [S] search-service (create)',
      '      [U] search-upstream (create)',
      '        [T] s1:80 (create)',
      '='.repeat(40),
      'Summary:',
      '  Upstreams: create 2, update 0, unchanged 0',
      '  Targets: create 2, update 0, unchanged 0',
      '  Services: create 2, update 0, unchanged 0',
      '  Routes: create 2, update 0, unchanged 0',
    ]);
  });

  it('uses icons and box drawing by default', async () => {
    const plan = await buildPlan(new FakeGateway(), loadDocument(NESTED_DOCUMENT).document);

    const lines = renderPlan(plan, { color: false });

    expect(lines[1]).toBe('─'.repeat(40));
    expect(lines[3]).toBe('  🧩 orders (create ✨)');
    expect(lines[7]).toBe('  🛣️ orders-route (create ✨)');
  });

  it('hides unchanged leaves in compact mode and shows field diffs', async () => {
    const gateway = new FakeGateway();
    gateway.seedUpstream('pool', [
      { target: 'a:80', weight: 10 },
      { target: 'b:80', weight: 100 },
    ]);
    const plan = await buildPlan(gateway, loadDocument(POOL_DOCUMENT).document);

    const lines = renderPlan(plan, { ascii: true, color: false, compact: true, showDiff: true });

    expect(lines).toEqual([
      'Change plan:',
      '='.repeat(40),
      'Upstreams:',
      '  [U] pool (no change)',
      '    [T] a:80 (update)',
      '        weight: 10 -> 20',
      '='.repeat(40),
      'Summary:',
      '  Upstreams: create 0, update 0, unchanged 1',
      '  Targets: create 0, update 1, unchanged 1',
      '  Services: create 0, update 0, unchanged 0',
      '  Routes: create 0, update 0, unchanged 0',
      OVERWRITE_HINT,
    ]);
  });

  it('omits the overwrite hint when overwrite is enabled', async () => {
    const gateway = new FakeGateway();
    gateway.seedUpstream('pool', [{ target: 'a:80', weight: 10 }]);
    const plan = await buildPlan(gateway, loadDocument(POOL_DOCUMENT).document);

    const lines = renderPlan(plan, { ascii: true, color: false, overwrite: true });

    expect(lines).not.toContain(OVERWRITE_HINT);
    expect(lines).toContain('    [T] b:80 (create)');
  });
});

describe('formatFieldChange', () => {
  const plain = new Chalk({ level: 0 });

  it('lists removed then added set members', () => {
    expect(formatFieldChange({ field: 'paths', added: ['/c'], removed: ['/b'] }, plain)).toEqual([
      'paths:',
      '  - /b',
      '  + /c',
    ]);
  });

  it('shows (none) for a missing scalar', () => {
    expect(formatFieldChange({ field: 'path_handling', oldValue: undefined, newValue: 'v1' }, plain)).toEqual([
      'path_handling: (none) -> v1',
    ]);
  });
});
