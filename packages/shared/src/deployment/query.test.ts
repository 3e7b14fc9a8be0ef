import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import type { Deployment, DeploymentQuery } from '../types/deployment.js';
import { abortDeployment, applyDeviceTransition, assignTargets, createDeployment, markFinished } from './deployment.js';
import { defaultDeploymentQuery, matchesQuery, parseDeploymentQuery } from './query.js';

describe('parseDeploymentQuery', () => {
  it('applies defaults', () => {
    expect(defaultDeploymentQuery()).toEqual({
      status: 'any',
      limit: 20,
      skip: 0,
      sort: 'desc',
      searchText: undefined,
    });
  });

  it('maps query string fields onto the query model', () => {
    const query = parseDeploymentQuery({
      search: ' app-v2 ',
      type: 'configuration',
      status: 'aborted',
      limit: '50',
      offset: '100',
      createdAfter: '2026-01-01T00:00:00.000Z',
      createdBefore: '2026-02-01T00:00:00.000Z',
      sort: 'asc',
    });

    expect(query).toEqual({
      searchText: 'app-v2',
      type: 'configuration',
      status: 'aborted',
      limit: 50,
      skip: 100,
      createdAfter: new Date('2026-01-01T00:00:00.000Z'),
      createdBefore: new Date('2026-02-01T00:00:00.000Z'),
      sort: 'asc',
    });
  });

  it('treats a blank search as no search', () => {
    expect(parseDeploymentQuery({ search: '   ' }).searchText).toBeUndefined();
  });

  it('rejects unknown status filters', () => {
    expect(() => parseDeploymentQuery({ status: 'running' })).toThrow(ZodError);
  });

  it('rejects limits above the maximum', () => {
    expect(() => parseDeploymentQuery({ limit: '501' })).toThrow(ZodError);
  });

  it('rejects malformed dates', () => {
    expect(() => parseDeploymentQuery({ createdAfter: 'yesterday' })).toThrow(ZodError);
  });
});

describe('matchesQuery', () => {
  function deployment(name: string, artifactName: string, created: string): Deployment {
    const fresh = createDeployment({ name, artifactName, devices: ['d1', 'd2'] }, { now: () => new Date(created) });
    return assignTargets(fresh, ['d1', 'd2']);
  }

  function query(overrides: Partial<DeploymentQuery> = {}): DeploymentQuery {
    return { ...defaultDeploymentQuery(), ...overrides };
  }

  const pending = deployment('Spring Rollout', 'app-v2', '2026-01-10T00:00:00.000Z');
  const inProgress = applyDeviceTransition(pending, 'pending', 'downloading').deployment;
  const finished = markFinished(pending, new Date('2026-01-11T00:00:00.000Z'));
  const aborted = abortDeployment(pending, new Date('2026-01-11T00:00:00.000Z'));

  it('matches everything by default', () => {
    expect(matchesQuery(pending, query())).toBe(true);
  });

  it('searches name and artifact name case-insensitively', () => {
    expect(matchesQuery(pending, query({ searchText: 'spring' }))).toBe(true);
    expect(matchesQuery(pending, query({ searchText: 'APP-V' }))).toBe(true);
    expect(matchesQuery(pending, query({ searchText: 'autumn' }))).toBe(false);
  });

  it('treats untyped deployments as software', () => {
    const untyped: Deployment = { ...pending, type: undefined };

    expect(matchesQuery(untyped, query({ type: 'software' }))).toBe(true);
    expect(matchesQuery(untyped, query({ type: 'configuration' }))).toBe(false);
  });

  it('compares the derived status', () => {
    expect(matchesQuery(pending, query({ status: 'pending' }))).toBe(true);
    expect(matchesQuery(inProgress, query({ status: 'inprogress' }))).toBe(true);
    expect(matchesQuery(inProgress, query({ status: 'pending' }))).toBe(false);
    expect(matchesQuery(finished, query({ status: 'finished' }))).toBe(true);
  });

  it('selects aborted only for finished deployments with aborted devices', () => {
    expect(matchesQuery(aborted, query({ status: 'aborted' }))).toBe(true);
    expect(matchesQuery(finished, query({ status: 'aborted' }))).toBe(false);
  });

  it('includes both ends of the creation range', () => {
    const at = new Date('2026-01-10T00:00:00.000Z');

    expect(matchesQuery(pending, query({ createdAfter: at, createdBefore: at }))).toBe(true);
    expect(matchesQuery(pending, query({ createdAfter: new Date('2026-01-10T00:00:00.001Z') }))).toBe(false);
    expect(matchesQuery(pending, query({ createdBefore: new Date('2026-01-09T23:59:59.999Z') }))).toBe(false);
  });
});
