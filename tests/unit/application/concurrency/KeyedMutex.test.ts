import { KeyedMutex } from '../../../../src/application/concurrency/KeyedMutex';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('KeyedMutex', () => {
    it('should run sections for the same key one at a time', async () => {
        const mutex = new KeyedMutex();
        const events: string[] = [];
        let releaseFirst: () => void = () => undefined;
        const firstGate = new Promise<void>((resolve) => {
            releaseFirst = resolve;
        });

        const first = mutex.runExclusive('k', async () => {
            events.push('first:start');
            await firstGate;
            events.push('first:end');
        });
        const second = mutex.runExclusive('k', async () => {
            events.push('second:start');
        });

        await tick();
        expect(events).toEqual(['first:start']);

        releaseFirst();
        await Promise.all([first, second]);
        expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    });

    it('should let different keys run concurrently', async () => {
        const mutex = new KeyedMutex();
        const events: string[] = [];
        let releaseA: () => void = () => undefined;
        const gateA = new Promise<void>((resolve) => {
            releaseA = resolve;
        });

        const a = mutex.runExclusive('a', async () => {
            await gateA;
            events.push('a');
        });
        const b = mutex.runExclusive('b', async () => {
            events.push('b');
        });

        await b;
        expect(events).toEqual(['b']);
        releaseA();
        await a;
        expect(events).toEqual(['b', 'a']);
    });

    it('should release the lock when a section throws', async () => {
        const mutex = new KeyedMutex();

        await expect(mutex.runExclusive('k', () => {
            throw new Error('failed section');
        })).rejects.toThrow('failed section');

        await expect(mutex.runExclusive('k', () => 'next')).resolves.toBe('next');
        expect(mutex.isLocked('k')).toBe(false);
    });
});
