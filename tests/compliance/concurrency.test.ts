import { describe, it, expect } from 'vitest';
import { AdmissionGate } from '../../src/server/utils/concurrency.js';
import { delay } from './helpers.js';

describe('AdmissionGate', () => {
  it('never runs more than the limit at once', async () => {
    const gate = new AdmissionGate(2);
    let active = 0;
    let peak = 0;

    const results = await Promise.all(
      [30, 10, 20, 5, 15].map((ms, index) =>
        gate.run(async () => {
          active++;
          peak = Math.max(peak, active);
          await delay(ms);
          active--;
          return index;
        })
      )
    );

    expect(peak).toBe(2);
    expect(results).toEqual([0, 1, 2, 3, 4]);
  });

  it('admits queued work in FIFO order', async () => {
    const gate = new AdmissionGate(1);
    const started: number[] = [];

    await Promise.all(
      [0, 1, 2, 3].map((index) =>
        gate.run(async () => {
          started.push(index);
          await delay(1);
        })
      )
    );

    expect(started).toEqual([0, 1, 2, 3]);
  });

  it('reports active and pending counts', async () => {
    const gate = new AdmissionGate(1);
    const first = gate.run(() => delay(10));
    const second = gate.run(() => delay(1));

    expect(gate.activeCount).toBe(1);
    expect(gate.pendingCount).toBe(1);

    await Promise.all([first, second]);
    expect(gate.activeCount).toBe(0);
    expect(gate.pendingCount).toBe(0);
  });

  it('releases its slot when a task fails', async () => {
    const gate = new AdmissionGate(1);
    const failing = gate.run(async () => {
      throw new Error('boom');
    });
    const next = gate.run(async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('rejects a non-positive limit', () => {
    expect(() => new AdmissionGate(0)).toThrow(TypeError);
  });
});
