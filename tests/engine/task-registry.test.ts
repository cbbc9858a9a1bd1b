import { TaskRegistry } from '../../src/engine/task-registry';

describe('TaskRegistry', () => {
  it('admits one run per task identifier', () => {
    const registry = new TaskRegistry();
    expect(registry.tryAcquire('t1', 'run_a')).toBe(true);
    expect(registry.tryAcquire('t1', 'run_b')).toBe(false);
    expect(registry.tryAcquire('t2', 'run_b')).toBe(true);
    expect(registry.inFlightCount()).toBe(2);
  });

  it('only lets the owning run release', () => {
    const registry = new TaskRegistry();
    registry.tryAcquire('t1', 'run_a');

    expect(registry.release('t1', 'run_b')).toBe(false);
    expect(registry.isInFlight('t1')).toBe(true);

    expect(registry.release('t1', 'run_a')).toBe(true);
    expect(registry.isInFlight('t1')).toBe(false);
    expect(registry.tryAcquire('t1', 'run_c')).toBe(true);
  });

  it('exposes a copy of the lease', () => {
    const registry = new TaskRegistry();
    registry.tryAcquire('t1', 'run_a');

    const lease = registry.getLease('t1');
    expect(lease?.runId).toBe('run_a');
    expect(typeof lease?.acquiredAt).toBe('string');
    expect(registry.getLease('missing')).toBeUndefined();
  });
});
