import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { StateStore } from '../services/state-store';

vi.mock('../utils/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const now = () => new Date('2024-05-01T00:00:00Z');
let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'state-store-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('StateStore', () => {
  it('starts empty when there is no previous state', async () => {
    const store = await StateStore.load(path.join(dir, 'in', 'state.json'), now);

    expect(store.toJSON()).toEqual({ schema: {} });
    expect(store.lastUpdated).toBeUndefined();
  });

  it('keeps stored columns first and appends new ones', () => {
    const store = StateStore.empty(now);
    store.columnsFor('users', ['id', 'name', 'title']);

    expect(store.columnsFor('users', ['id', 'email', 'name'])).toEqual(['id', 'name', 'title', 'email']);
  });

  it('round-trips through the state file', async () => {
    const target = path.join(dir, 'out', 'state.json');
    const store = StateStore.empty(now);
    store.columnsFor('tickets', ['id', 'name']);

    await store.save(target);

    expect(JSON.parse(await readFile(target, 'utf-8'))).toEqual({
      schema: { tickets: { columns: ['id', 'name'], last_updated: '2024-05-01T00:00:00.000Z' } },
      last_updated: '2024-05-01T00:00:00.000Z',
    });

    const reloaded = await StateStore.load(target, now);
    expect(reloaded.storedColumns('tickets')).toEqual(['id', 'name']);
    expect(reloaded.lastUpdated).toBe('2024-05-01T00:00:00.000Z');
  });

  it('ignores a corrupt state file', async () => {
    const source = path.join(dir, 'state.json');
    await writeFile(source, '{ not json', 'utf-8');

    const store = await StateStore.load(source, now);

    expect(store.toJSON()).toEqual({ schema: {} });
  });
});
