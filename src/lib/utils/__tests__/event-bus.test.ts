import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../event-bus';

interface TestEvents {
    'pair:scored': { pair: string; confidence: number };
    'batch:done': number;
}

describe('EventBus', () => {
    it('should emit and receive typed events', () => {
        const bus = new EventBus<TestEvents>();
        const handler = vi.fn();
        const unsubscribe = bus.on('pair:scored', handler);

        bus.emit('pair:scored', { pair: 'a::b', confidence: 0.9 });
        expect(handler).toHaveBeenCalledWith({ pair: 'a::b', confidence: 0.9 });
        expect(handler).toHaveBeenCalledTimes(1);

        unsubscribe();
        bus.emit('pair:scored', { pair: 'a::c', confidence: 0.5 });
        expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should keep listeners per event', () => {
        const bus = new EventBus<TestEvents>();
        const scored = vi.fn();
        const done = vi.fn();
        bus.on('pair:scored', scored);
        bus.on('batch:done', done);

        bus.emit('batch:done', 3);

        expect(done).toHaveBeenCalledWith(3);
        expect(scored).not.toHaveBeenCalled();
        expect(bus.listenerCount('batch:done')).toBe(1);
    });

    it('should drop every listener on clear', () => {
        const bus = new EventBus<TestEvents>();
        const done = vi.fn();
        bus.on('batch:done', done);

        bus.clear();
        bus.emit('batch:done', 1);

        expect(done).not.toHaveBeenCalled();
        expect(bus.listenerCount('batch:done')).toBe(0);
    });
});
