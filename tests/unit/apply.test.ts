/**
 * Unit Tests: Plan Execution
 *
 * Tests the overwrite policy (updates withheld as skips unless enabled),
 * patch contents, and abort-on-first-failure behavior.
 *
 * @see src/plan/execute.ts
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { applyPlan, buildPlan } from '../../src/plan/index.js';
import { loadDocument } from '../../src/spec/normalize.js';
import { ExecutionError } from '../../src/errors.js';
import { createLogger } from '../../src/api/logger.js';
import { FakeGateway } from '../helpers/fake-gateway.js';

const quiet = createLogger({ level: 'error' });

const POOL_DOCUMENT = `
upstreams:
  - name: pool
    targets:
      - target: a:80
        weight: 20
      - target: b:80
`;

describe('applyPlan', () => {
  let gateway: FakeGateway;

  beforeEach(() => {
    gateway = new FakeGateway();
  });

  describe('overwrite policy', () => {
    beforeEach(() => {
      gateway.seedUpstream('pool', [{ target: 'a:80', weight: 10 }]);
    });

    it('records updates as skips without overwrite', async () => {
      const plan = await buildPlan(gateway, loadDocument(POOL_DOCUMENT).document);
      gateway.clearCalls();

      const result = await applyPlan(gateway, plan, { overwrite: false, logger: quiet });

      expect(result.results.map((entry) => [entry.name, entry.status])).toEqual([
        ['pool', 'unchanged'],
        ['pool/a:80', 'skipped'],
        ['pool/b:80', 'created'],
      ]);
      expect(result.summary).toEqual({ created: 1, updated: 0, skipped: 1, unchanged: 1, failed: 0 });
      expect(result.skips).toEqual([{ kind: 'target', name: 'pool/a:80', fields: ['weight'] }]);
      expect(result.success).toBe(true);
      expect(gateway.mutations()).toEqual([
        { op: 'targets.add', name: 'pool', body: { target: 'b:80', weight: 100 } },
      ]);
    });

    it('applies updates with overwrite', async () => {
      const plan = await buildPlan(gateway, loadDocument(POOL_DOCUMENT).document);
      gateway.clearCalls();

      const result = await applyPlan(gateway, plan, { overwrite: true, logger: quiet });

      expect(result.summary).toEqual({ created: 1, updated: 1, skipped: 0, unchanged: 1, failed: 0 });
      expect(result.skips).toEqual([]);
      expect(gateway.mutations().map((call) => call.body)).toEqual([
        { target: 'a:80', weight: 20 },
        { target: 'b:80', weight: 100 },
      ]);
    });
  });

  it('keeps a remote weight the document does not declare', async () => {
    gateway.seedUpstream('pool', [{ target: 'a:80', weight: 50 }]);
    const plan = await buildPlan(
      gateway,
      loadDocument('upstreams:\n  - name: pool\n    targets:\n      - target: a:80\n').document
    );
    gateway.clearCalls();

    const result = await applyPlan(gateway, plan, { overwrite: true, logger: quiet });

    expect(plan.changes.map((change) => [change.name, change.action])).toEqual([
      ['pool', 'none'],
      ['pool/a:80', 'none'],
    ]);
    expect(result.summary.unchanged).toBe(2);
    expect(gateway.mutations()).toEqual([]);
    expect(gateway.targetStore.get('pool')?.[0]?.weight).toBe(50);
  });

  describe('service protocol drift', () => {
    const SERVICE_DOCUMENT = `
upstreams:
  - name: pool
services:
  - name: s1
    upstream: pool
    protocol: https
    port: 443
`;

    beforeEach(() => {
      gateway.seedUpstream('pool');
      gateway.seedService({ name: 's1', protocol: 'http', host: 'pool', port: 443 });
    });

    it('skips the update without overwrite', async () => {
      const plan = await buildPlan(gateway, loadDocument(SERVICE_DOCUMENT).document);
      gateway.clearCalls();

      const result = await applyPlan(gateway, plan, { overwrite: false, logger: quiet });

      expect(plan.changes.find((change) => change.kind === 'service')?.action).toBe('update');
      expect(gateway.mutations()).toEqual([]);
      expect(result.skips).toEqual([{ kind: 'service', name: 's1', fields: ['protocol'] }]);
    });

    it('patches only the protocol with overwrite', async () => {
      const plan = await buildPlan(gateway, loadDocument(SERVICE_DOCUMENT).document);
      gateway.clearCalls();

      const result = await applyPlan(gateway, plan, { overwrite: true, logger: quiet });

      expect(result.summary.updated).toBe(1);
      expect(gateway.mutations()).toEqual([{ op: 'services.update', name: 's1', body: { protocol: 'https' } }]);
    });
  });

  it('sends only the changed service fields', async () => {
    gateway.seedService({ name: 's1', protocol: 'http', host: 's1.internal', port: 80, retries: 5 });
    const plan = await buildPlan(
      gateway,
      loadDocument('services:\n  - name: s1\n    url: http://s1.internal\n    retries: 2\n').document
    );
    gateway.clearCalls();

    await applyPlan(gateway, plan, { overwrite: true, logger: quiet });

    expect(gateway.mutations()).toEqual([{ op: 'services.update', name: 's1', body: { retries: 2 } }]);
  });

  it('stops at the first failure', async () => {
    gateway.failOn('services.create');
    const plan = await buildPlan(
      gateway,
      loadDocument('services:\n  - name: s1\n    url: http://s1.internal\nroutes:\n  - name: r1\n    service: s1\n').document
    );

    const result = await applyPlan(gateway, plan, { overwrite: false, logger: quiet });

    const message = 'Failed to create Service "s1": Admin API error (500)';
    expect(result.success).toBe(false);
    expect(result.results).toEqual([{ kind: 'service', name: 's1', status: 'failed', error: message }]);
    expect(result.summary.failed).toBe(1);
    expect(result.errors).toEqual([message]);
    expect(result.error).toBeInstanceOf(ExecutionError);
    expect(gateway.calls.some((call) => call.op === 'routes.create')).toBe(false);
  });
});
