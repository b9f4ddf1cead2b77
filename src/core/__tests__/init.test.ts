/**
 * Tests for plan initialization.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createPlan, initPlan } from '../init.js';
import { checkPlanSchema } from '../schema.js';
import { ExitCode } from '../../types/exit-codes.js';
import { rejectsWithPlanError } from './fixtures.js';

describe('createPlan', () => {
  it('builds an empty plan that passes the schema', () => {
    const plan = createPlan('Storefront');
    expect(plan.meta.project).toBe('Storefront');
    expect(plan.meta.version).toBe('1.0.0');
    expect(plan.meta.business_plan_path).toBe('.claude/BUSINESS_PLAN.md');
    expect(plan.meta.created_at).toBe(plan.meta.updated_at);
    expect(plan.phases).toEqual([]);
    expect(checkPlanSchema(plan).valid).toBe(true);
  });
});

describe('initPlan', () => {
  let tempDir: string;
  let planPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'pv-init-'));
    planPath = join(tempDir, 'plan.json');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('creates a plan when no file exists', async () => {
    const plan = await initPlan(planPath, { name: 'Storefront' });
    expect(plan.meta.project).toBe('Storefront');
  });

  it('refuses to replace an existing file', async () => {
    await writeFile(planPath, '{}');
    const err = await rejectsWithPlanError(initPlan(planPath, { name: 'Storefront' }));
    expect(err.code).toBe(ExitCode.ALREADY_EXISTS);
    expect(err.fix).toBe('Use --force to overwrite');
  });

  it('replaces an existing file with force', async () => {
    await writeFile(planPath, '{}');
    const plan = await initPlan(planPath, { name: 'Storefront', force: true });
    expect(plan.meta.project).toBe('Storefront');
  });

  it('rejects a blank name', async () => {
    const err = await rejectsWithPlanError(initPlan(planPath, { name: '  ' }));
    expect(err.code).toBe(ExitCode.INVALID_INPUT);
  });
});
