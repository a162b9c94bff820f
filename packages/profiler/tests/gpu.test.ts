import { test } from 'node:test';
import assert from 'node:assert/strict';
import { createGpuProbe, parseNvidiaSmiCsv, parseReading } from '../src/gpu';
import type { GraphicsSource } from '../src/types';
import { fakeTool } from './helpers';

const SMI_OUTPUT = [
  '0, NVIDIA A100-SXM4-40GB, 87, 30512, 40960, 64, 312.45',
  '1, NVIDIA A100-SXM4-40GB, [N/A], 0, 40960, 38, [N/A]',
  'truncated, line',
  '',
].join('\n');

const graphics: GraphicsSource = async () => ({
  controllers: [
    {
      vendor: 'NVIDIA Corporation',
      model: 'GeForce RTX 4090',
      vram: 24564,
      utilizationGpu: 12,
      memoryUsed: 1024,
      memoryTotal: 24564,
      temperatureGpu: 45,
      powerDraw: 80.5,
    },
    { vendor: 'Intel Corporation', model: 'UHD Graphics 770', vram: 256 },
  ],
});

test('parseReading treats N/A markers as unavailable', () => {
  assert.equal(parseReading(' 71.5 '), 71.5);
  assert.equal(parseReading('[N/A]'), undefined);
  assert.equal(parseReading('N/A'), undefined);
  assert.equal(parseReading(''), undefined);
  assert.equal(parseReading(undefined), undefined);
});

test('parseNvidiaSmiCsv reads every complete line and omits unavailable fields', () => {
  assert.deepStrictEqual(parseNvidiaSmiCsv(SMI_OUTPUT), [
    {
      index: 0,
      name: 'NVIDIA A100-SXM4-40GB',
      utilizationPercent: 87,
      memoryUsedMb: 30512,
      memoryTotalMb: 40960,
      temperatureC: 64,
      powerDrawW: 312.45,
      source: 'cli',
    },
    {
      index: 1,
      name: 'NVIDIA A100-SXM4-40GB',
      utilizationPercent: undefined,
      memoryUsedMb: 0,
      memoryTotalMb: 40960,
      temperatureC: 38,
      powerDrawW: undefined,
      source: 'cli',
    },
  ]);
});

test('gpu probe queries nvidia-smi with the fixed field list', async () => {
  const tool = fakeTool({ 'nvidia-smi': { ok: true, stdout: SMI_OUTPUT } });
  const devices = await createGpuProbe({ runTool: tool, graphics })();
  assert.equal(devices.length, 2);
  assert.deepEqual(tool.calls, [
    'nvidia-smi --query-gpu=index,name,utilization.gpu,memory.used,memory.total,temperature.gpu,power.draw --format=csv,noheader,nounits',
  ]);
});

test('gpu probe falls back to the graphics library when nvidia-smi is missing', async () => {
  const devices = await createGpuProbe({ runTool: fakeTool({}), graphics })();
  assert.deepStrictEqual(devices, [
    {
      index: 0,
      name: 'GeForce RTX 4090',
      utilizationPercent: 12,
      memoryUsedMb: 1024,
      memoryTotalMb: 24564,
      temperatureC: 45,
      powerDrawW: 80.5,
      source: 'library',
    },
  ]);
});

test('gpu probe falls back after a timeout', async () => {
  const tool = fakeTool({ 'nvidia-smi': { ok: false, reason: 'timeout', detail: 'nvidia-smi timed out' } });
  const devices = await createGpuProbe({ runTool: tool, graphics })();
  assert.equal(devices[0]?.source, 'library');
});

test('gpu probe returns an empty list when no source is available', async () => {
  const failingGraphics: GraphicsSource = async () => {
    throw new Error('lspci missing');
  };
  const devices = await createGpuProbe({ runTool: fakeTool({}), graphics: failingGraphics })();
  assert.deepEqual(devices, []);
});

test('gpu probe skips the fallback once sampling is aborted', async () => {
  let graphicsCalls = 0;
  const countingGraphics: GraphicsSource = async () => {
    graphicsCalls += 1;
    return { controllers: [] };
  };
  const tool = fakeTool({ 'nvidia-smi': { ok: false, reason: 'aborted', detail: 'nvidia-smi aborted' } });
  const devices = await createGpuProbe({ runTool: tool, graphics: countingGraphics })();
  assert.deepEqual(devices, []);
  assert.equal(graphicsCalls, 0);
});
