import { describe, expect, it } from 'vitest';
import path from 'node:path';
import { writeFile } from 'node:fs/promises';
import { doctorReport, loadSyncConfig, parseSyncConfig, readEnv } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';
import { loadEnvFiles, parseEnvLine } from '../src/env.js';
import { tempDir } from './fixtures.js';

describe('readEnv', () => {
  it('coerces numbers and leaves unset variables undefined', () => {
    const env = readEnv({ TASKLINK_WEBHOOK_PORT: '9000', TASKLINK_CONFLICT_STRATEGY: 'merge' });
    expect(env.TASKLINK_WEBHOOK_PORT).toBe(9000);
    expect(env.TASKLINK_CONFLICT_STRATEGY).toBe('merge');
    expect(env.TASKLINK_PLANNER_TOKEN).toBeUndefined();
  });

  it('rejects invalid values', () => {
    expect(() => readEnv({ TASKLINK_CONFLICT_STRATEGY: 'coin_flip' })).toThrow(ConfigurationError);
    expect(() => readEnv({ TASKLINK_POLL_INTERVAL_MINUTES: '-1' })).toThrow(/TASKLINK_POLL_INTERVAL_MINUTES/);
  });

  it('lists missing credentials in the doctor report', () => {
    const report = doctorReport(readEnv({ TASKLINK_PLANNER_TOKEN: 'test-token' }));
    expect(report.missing).toEqual(['TASKLINK_PLANNER_DATABASE_ID', 'TASKLINK_TASKS_TOKEN']);
    expect(report.notes).toContain('Webhook secrets not set: incoming webhook signatures will not be verified.');
  });
});

describe('sync config', () => {
  it('fills defaults', () => {
    const config = parseSyncConfig({ fieldMapping: { Name: 'content' } });
    expect(config).toEqual({
      fieldMapping: { Name: 'content' },
      descriptionFields: { enabled: false, separator: '\n\n', fields: [] },
      bidirectional: { conflictResolution: 'last_modified_wins', syncDeletions: false, createInPlanner: true },
      sourceLabel: 'From Planner',
      annotationPrefix: 'Planner ID:',
    });
  });

  it('requires a content mapping and unique targets', () => {
    expect(() => parseSyncConfig({ fieldMapping: { Due: 'due_date' } })).toThrow('one property must map to "content"');
    expect(() => parseSyncConfig({ fieldMapping: { Name: 'content', Title: 'content' } })).toThrow(
      'targets mapped twice: content',
    );
    expect(() => parseSyncConfig({ fieldMapping: { Name: 'title' } })).toThrow(ConfigurationError);
  });

  it('loads the bundled example config', () => {
    const config = loadSyncConfig(path.join('config', 'sync-config.json'));
    expect(config.fieldMapping.Repeat).toBe('due_string');
    expect(config.completionField).toEqual({ name: 'Status', doneValue: 'Done', openValue: 'Not started' });
    expect(config.parentTaskField?.createParent).toBe(true);
  });

  it('reports unreadable and malformed files', async () => {
    const dir = await tempDir();
    expect(() => loadSyncConfig(path.join(dir, 'missing.json'))).toThrow('Cannot read sync config');

    const bad = path.join(dir, 'bad.json');
    await writeFile(bad, '{', 'utf8');
    expect(() => loadSyncConfig(bad)).toThrow('is not valid JSON');
  });
});

describe('env files', () => {
  it('parses dotenv lines', () => {
    expect(parseEnvLine('# comment')).toBeUndefined();
    expect(parseEnvLine('')).toBeUndefined();
    expect(parseEnvLine('NOEQUALS')).toBeUndefined();
    expect(parseEnvLine('export KEY=value # note')).toEqual(['KEY', 'value']);
    expect(parseEnvLine('KEY="a # b\\nc"')).toEqual(['KEY', 'a # b\nc']);
    expect(parseEnvLine("KEY='x'")).toEqual(['KEY', 'x']);
  });

  it('loads files without overriding existing variables; earlier files win', async () => {
    const dir = await tempDir();
    await writeFile(path.join(dir, '.env.local'), 'A=local\n', 'utf8');
    await writeFile(path.join(dir, '.env'), 'A=base\nB=base\nC=base\n', 'utf8');
    const env: NodeJS.ProcessEnv = { C: 'process' };

    const result = loadEnvFiles(['.env.local', '.env'], dir, env);

    expect(result).toEqual({ loaded: ['.env.local', '.env'], keys: ['A', 'B'] });
    expect(env).toEqual({ A: 'local', B: 'base', C: 'process' });
  });
});
