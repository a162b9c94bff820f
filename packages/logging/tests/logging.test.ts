import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import {
  configureLogging,
  currentLogFile,
  errorMessage,
  logDebug,
  logInfo,
  logWarn,
  resolveLogLevel,
} from '../src/index';

test('resolveLogLevel accepts known levels and falls back otherwise', () => {
  assert.equal(resolveLogLevel('DEBUG'), 'debug');
  assert.equal(resolveLogLevel(' warn '), 'warn');
  assert.equal(resolveLogLevel('verbose'), 'info');
  assert.equal(resolveLogLevel(undefined, 'error'), 'error');
});

test('configureLogging writes a plain-text run log with redacted meta', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'xpu-logging-'));
  const logFile = path.join(dir, 'nested', 'run.log');
  try {
    configureLogging({ level: 'info', logFile, console: false });
    assert.equal(currentLogFile(), logFile);

    logInfo('[test] collector started', { intervalMs: 250, token: 'test-secret' });
    logWarn('[test] probe failed', new Error('tool missing'));
    logDebug('[test] hidden below level');
    configureLogging({ console: false });

    const content = await readFile(logFile, 'utf8');
    const lines = content.trim().split('\n');
    assert.equal(lines.length, 2);
    assert.match(lines[0], /INFO.*\[test\] collector started/);
    assert.ok(lines[0].includes('[REDACTED]'));
    assert.ok(!content.includes('test-secret'));
    assert.ok(!content.includes('\u001b['));
    assert.match(lines[1], /WARN.*\[test\] probe failed/);
    assert.ok(lines[1].includes('tool missing'));
    assert.equal(currentLogFile(), undefined);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test('errorMessage unwraps errors and stringifies other values', () => {
  assert.equal(errorMessage(new Error('boom')), 'boom');
  assert.equal(errorMessage('plain'), 'plain');
  assert.equal(errorMessage(42), '42');
});
