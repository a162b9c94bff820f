import { test } from 'node:test';
import assert from 'node:assert/strict';
import { createSystemProbe } from '../src/system';
import type { SystemSource } from '../src/system';

const source: SystemSource = {
  currentLoad: async () => ({ currentLoad: 37.5, cpus: [{}, {}, {}, {}] }),
  mem: async () => ({ total: 16_000, active: 4_000 }),
  fsSize: async () => [
    { mount: '/boot', size: 1_000, used: 100 },
    { mount: '/', size: 2_000, used: 500 },
  ],
  networkStats: async () => [
    { rx_bytes: 100, tx_bytes: 50 },
    { rx_bytes: 20, tx_bytes: 5 },
  ],
};

test('system probe combines load, memory, root filesystem and network counters', async () => {
  const stats = await createSystemProbe({ source })();
  assert.deepStrictEqual(stats, {
    cpuPercent: 37.5,
    cpuCount: 4,
    memoryTotalBytes: 16_000,
    memoryUsedBytes: 4_000,
    memoryPercent: 25,
    diskTotalBytes: 2_000,
    diskUsedBytes: 500,
    diskPercent: 25,
    networkBytesReceived: 120,
    networkBytesSent: 55,
  });
});

test('system probe leaves out the fields of a failing query', async () => {
  const stats = await createSystemProbe({
    source: {
      ...source,
      mem: async () => {
        throw new Error('meminfo unreadable');
      },
    },
  })();
  assert.equal(stats.cpuPercent, 37.5);
  assert.equal('memoryTotalBytes' in stats, false);
  assert.equal('memoryPercent' in stats, false);
  assert.equal(stats.diskPercent, 25);
});

test('system probe reports the configured mount', async () => {
  const stats = await createSystemProbe({ source, mount: '/boot' })();
  assert.equal(stats.diskTotalBytes, 1_000);
  assert.equal(stats.diskPercent, 10);
});
