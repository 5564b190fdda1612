import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

import { createHttpServerConfig, createStdioServerConfig } from '../../src/config/connector-config.js';
import { ConnectorConfigStore } from '../../src/services/connector-config-store.js';
import { ConnectorConfigError } from '../../src/types/errors.js';

const CREATED = new Date('2026-01-01T00:00:00.000Z');

describe('ConnectorConfigStore', () => {
  let dir: string;
  let filePath: string;
  let store: ConnectorConfigStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'connector-config-'));
    filePath = join(dir, 'nested', 'connectors.json');
    store = new ConnectorConfigStore(filePath, { now: () => new Date('2026-02-02T00:00:00.000Z') });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns an empty config when the file does not exist', async () => {
    expect(store.exists()).toBe(false);
    expect(await store.load()).toEqual({ version: 1, builtIn: {}, custom: [] });
  });

  it('persists custom servers across store instances', async () => {
    const server = createStdioServerConfig({ name: 'Notes', command: 'notes-mcp', args: ['--stdio'] }, CREATED);

    await store.addCustomServer(server);

    const reopened = new ConnectorConfigStore(filePath);
    expect(await reopened.customServers()).toEqual([server]);
    expect(store.exists()).toBe(true);
  });

  it('replaces a server added twice with the same id', async () => {
    const server = createStdioServerConfig({ name: 'Notes', command: 'notes-mcp' }, CREATED);

    await store.addCustomServer(server);
    await store.addCustomServer({ ...server, name: 'Notes v2' });

    expect((await store.customServers()).map((entry) => entry.name)).toEqual(['Notes v2']);
  });

  it('upgrades older documents to the current version', async () => {
    await store.save({ version: 0, builtIn: {}, custom: [] });
    expect((await store.load()).version).toBe(1);
  });

  it('fills defaults for missing sections', async () => {
    await store.save({ version: 1, builtIn: {}, custom: [] });
    await writeFile(filePath, '{}', 'utf-8');

    expect(await store.load()).toEqual({ version: 1, builtIn: {}, custom: [] });
  });

  it('rejects unreadable documents', async () => {
    await store.save({ version: 1, builtIn: {}, custom: [] });

    await writeFile(filePath, '{not json', 'utf-8');
    await expect(store.load()).rejects.toThrow(`Failed to parse connector config at ${filePath}`);

    await writeFile(filePath, JSON.stringify({ custom: [{ id: '' }] }), 'utf-8');
    await expect(store.load()).rejects.toBeInstanceOf(ConnectorConfigError);
  });

  it('bumps modifiedAt on update', async () => {
    const server = createStdioServerConfig({ name: 'Notes', command: 'notes-mcp' }, CREATED);
    await store.addCustomServer(server);

    expect(await store.updateCustomServer({ ...server, name: 'Renamed' })).toBe(true);

    const updated = await store.customServer(server.id);
    expect(updated?.name).toBe('Renamed');
    expect(updated?.createdAt).toBe('2026-01-01T00:00:00.000Z');
    expect(updated?.modifiedAt).toBe('2026-02-02T00:00:00.000Z');
    expect(await store.updateCustomServer({ ...server, id: 'missing' })).toBe(false);
  });

  it('refuses invalid servers before writing anything', async () => {
    const server = createHttpServerConfig({ name: 'Remote', url: 'http://example.com/mcp' }, CREATED);

    await expect(store.addCustomServer(server)).rejects.toThrow("Invalid server 'Remote': HTTP servers must use HTTPS.");
    expect(store.exists()).toBe(false);
  });

  it('enables, disables and removes servers', async () => {
    const notes = createStdioServerConfig({ name: 'Notes', command: 'notes-mcp' }, CREATED);
    const remote = createHttpServerConfig({ name: 'Remote', url: 'https://example.com/mcp' }, CREATED);
    await store.addCustomServer(notes);
    await store.addCustomServer(remote);

    expect(await store.setCustomServerEnabled(notes.id, false)).toBe(true);
    expect((await store.enabledCustomServers()).map((entry) => entry.name)).toEqual(['Remote']);

    expect(await store.removeCustomServer(remote.id)).toBe(true);
    expect(await store.removeCustomServer(remote.id)).toBe(false);
    expect(await store.setCustomServerEnabled(remote.id, true)).toBe(false);
    expect((await store.customServers()).map((entry) => entry.name)).toEqual(['Notes']);
  });

  it('treats built-ins without an entry as enabled', async () => {
    expect(await store.isBuiltInEnabled('shell')).toBe(true);

    await store.setBuiltInConfig('shell', { enabled: true, settings: { shell: '/bin/zsh' } });
    await store.setBuiltInEnabled('shell', false);

    expect(await store.isBuiltInEnabled('shell')).toBe(false);
    expect(await store.builtInConfig('shell')).toEqual({ enabled: false, settings: { shell: '/bin/zsh' } });
  });

  it('writes pretty-printed JSON', async () => {
    await store.setBuiltInEnabled('shell', false);

    expect(await readFile(filePath, 'utf-8')).toBe(
      JSON.stringify({ version: 1, builtIn: { shell: { enabled: false } }, custom: [] }, null, 2),
    );
  });

  it('backs up and restores the file', async () => {
    expect(await store.backup()).toBe(false);
    expect(await store.restoreFromBackup()).toBe(false);

    const server = createStdioServerConfig({ name: 'Notes', command: 'notes-mcp' }, CREATED);
    await store.addCustomServer(server);
    expect(await store.backup()).toBe(true);

    await store.removeCustomServer(server.id);
    expect(await store.customServers()).toEqual([]);

    expect(await store.restoreFromBackup()).toBe(true);
    expect(await store.customServers()).toEqual([server]);
  });

  it('refuses to restore an invalid backup', async () => {
    const flat = new ConnectorConfigStore(join(dir, 'connectors.json'));
    await writeFile(flat.backupPath, JSON.stringify({ custom: 'nope' }), 'utf-8');

    await expect(flat.restoreFromBackup()).rejects.toBeInstanceOf(ConnectorConfigError);
  });
});
