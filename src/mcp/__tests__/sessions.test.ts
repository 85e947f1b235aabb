import { describe, it, expect, vi } from 'vitest';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { AuthenticationError } from '../../errors';
import { SessionBinding, SessionRegistry } from '../sessions';

function createBinding(userId: string, expiresWhenIdle = false): SessionBinding {
    const [, serverSide] = InMemoryTransport.createLinkedPair();
    return new SessionBinding(userId, serverSide, { now: 1000, expiresWhenIdle });
}

function deferred() {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((r) => {
        resolve = r;
    });
    return { promise, resolve };
}

describe('SessionBinding', () => {
    it('should run tasks in the order they were queued', async () => {
        const binding = createBinding('user-a');
        const gate = deferred();
        const order: string[] = [];

        const first = binding.run(async () => {
            await gate.promise;
            order.push('first');
            return 1;
        });
        const second = binding.run(async () => {
            order.push('second');
            return 2;
        });

        gate.resolve();

        await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
        expect(order).toEqual(['first', 'second']);
    });

    it('should keep running tasks after one fails', async () => {
        const binding = createBinding('user-a');

        const failing = binding.run(async () => {
            throw new Error('boom');
        });
        const next = binding.run(async () => 'ok');

        await expect(failing).rejects.toThrow('boom');
        await expect(next).resolves.toBe('ok');
    });

    it('should reject new tasks once closed', async () => {
        const binding = createBinding('user-a');
        const task = vi.fn(async () => 'never');

        binding.close();

        expect(binding.isOpen).toBe(false);
        await expect(binding.run(task)).rejects.toBeInstanceOf(AuthenticationError);
        await expect(binding.run(task)).rejects.toThrow('Session has ended. Please reconnect.');
        expect(task).not.toHaveBeenCalled();
    });

    it('should only report idle when it expires when idle', () => {
        const expiring = createBinding('user-a', true);
        const stream = createBinding('user-a');

        expect(expiring.isIdle(500, 1499)).toBe(false);
        expect(expiring.isIdle(500, 1500)).toBe(true);
        expect(stream.isIdle(500, 1500)).toBe(false);
    });

    it('should move last activity forward on touch', () => {
        const binding = createBinding('user-a', true);

        binding.touch(4000);
        binding.touch(2000);

        expect(binding.lastActivityAt).toBe(4000);
        expect(binding.isIdle(500, 4499)).toBe(false);
    });
});

describe('SessionRegistry', () => {
    it('should only return a binding to the user it belongs to', () => {
        const registry = new SessionRegistry();
        const binding = createBinding('user-a');

        registry.register('session-1', binding);

        expect(registry.lookup('session-1', 'user-a')).toBe(binding);
        expect(registry.lookup('session-1', 'user-b')).toBeUndefined();
        expect(registry.lookup('session-2', 'user-a')).toBeUndefined();
    });

    it('should refuse to bind the same session id twice', () => {
        const registry = new SessionRegistry();
        registry.register('session-1', createBinding('user-a'));

        expect(() => registry.register('session-1', createBinding('user-b'))).toThrow(
            'Session session-1 is already bound'
        );
        expect(registry.get('session-1')?.userId).toBe('user-a');
    });

    it('should close a binding on release', () => {
        const registry = new SessionRegistry();
        const binding = createBinding('user-a');
        registry.register('session-1', binding);

        expect(registry.release('session-1')).toBe(binding);
        expect(binding.isOpen).toBe(false);
        expect(registry.size).toBe(0);
        expect(registry.release('session-1')).toBeUndefined();
    });

    it('should close bindings idle past the limit', async () => {
        const registry = new SessionRegistry();
        const stale = createBinding('user-a', true);
        const fresh = createBinding('user-a', true);
        const stream = createBinding('user-b');
        const closeStale = vi.spyOn(stale.transport, 'close');
        const closeFresh = vi.spyOn(fresh.transport, 'close');
        fresh.touch(5000);
        registry.register('session-1', stale);
        registry.register('session-2', fresh);
        registry.register('session-3', stream);

        const closed = await registry.closeIdle(3000, 5000);

        expect(closed).toBe(1);
        expect(closeStale).toHaveBeenCalledOnce();
        expect(closeFresh).not.toHaveBeenCalled();
        expect(stale.isOpen).toBe(false);
        expect(registry.get('session-1')).toBeUndefined();
        expect(registry.get('session-2')).toBe(fresh);
        expect(registry.get('session-3')).toBe(stream);
    });

    it('should close every binding of one user', async () => {
        const registry = new SessionRegistry();
        const a1 = createBinding('user-a');
        const a2 = createBinding('user-a', true);
        const b = createBinding('user-b');
        const closeA1 = vi.spyOn(a1.transport, 'close');
        const closeB = vi.spyOn(b.transport, 'close');
        registry.register('session-1', a1);
        registry.register('session-2', a2);
        registry.register('session-3', b);

        const closed = await registry.closeForUser('user-a');

        expect(closed).toBe(2);
        expect(closeA1).toHaveBeenCalledOnce();
        expect(closeB).not.toHaveBeenCalled();
        expect(registry.size).toBe(1);
        expect(registry.lookup('session-3', 'user-b')).toBe(b);
        expect(a2.isOpen).toBe(false);
    });

    it('should release a binding whose transport fails to close', async () => {
        const registry = new SessionRegistry();
        const binding = createBinding('user-a', true);
        vi.spyOn(binding.transport, 'close').mockRejectedValue(new Error('socket gone'));
        registry.register('session-1', binding);

        await expect(registry.closeIdle(0, 1000)).resolves.toBe(1);
        expect(registry.size).toBe(0);
    });

    it('should close every transport and empty itself', async () => {
        const registry = new SessionRegistry();
        const a = createBinding('user-a');
        const b = createBinding('user-b');
        const closeA = vi.spyOn(a.transport, 'close');
        const closeB = vi.spyOn(b.transport, 'close');
        registry.register('session-1', a);
        registry.register('session-2', b);

        await registry.closeAll();

        expect(closeA).toHaveBeenCalledOnce();
        expect(closeB).toHaveBeenCalledOnce();
        expect(registry.size).toBe(0);
        expect(a.isOpen).toBe(false);
    });
});
