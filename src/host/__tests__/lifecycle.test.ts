import { EventEmitter } from 'node:events';
import { describe, it, expect, vi } from 'vitest';
import { createProcessLifecycle } from '../lifecycle';

function fakeProcess() {
  return Object.assign(new EventEmitter(), { pid: 4242, kill: vi.fn() });
}

describe('createProcessLifecycle', () => {
  it('runs suspend listeners on SIGTSTP, then stops the process', () => {
    const proc = fakeProcess();
    const lifecycle = createProcessLifecycle(proc);
    const order: string[] = [];
    lifecycle.onSuspend(() => order.push('suspend'));
    proc.kill.mockImplementation(() => order.push('kill'));

    proc.emit('SIGTSTP');

    expect(order).toEqual(['suspend', 'kill']);
    expect(proc.kill).toHaveBeenCalledWith(4242, 'SIGSTOP');
  });

  it('runs resume listeners on SIGCONT', () => {
    const proc = fakeProcess();
    const lifecycle = createProcessLifecycle(proc);
    const onResume = vi.fn();
    lifecycle.onResume(onResume);

    proc.emit('SIGCONT');
    expect(onResume).toHaveBeenCalledTimes(1);
  });

  it('stops calling a listener after it unsubscribes', () => {
    const proc = fakeProcess();
    const lifecycle = createProcessLifecycle(proc);
    const onResume = vi.fn();
    const off = lifecycle.onResume(onResume);
    off();

    proc.emit('SIGCONT');
    expect(onResume).not.toHaveBeenCalled();
  });

  it('removes its signal handlers on dispose', () => {
    const proc = fakeProcess();
    const lifecycle = createProcessLifecycle(proc);
    expect(proc.listenerCount('SIGTSTP')).toBe(1);

    lifecycle.dispose();
    expect(proc.listenerCount('SIGTSTP')).toBe(0);
    expect(proc.listenerCount('SIGCONT')).toBe(0);
  });
});
