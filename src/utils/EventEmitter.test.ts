/**
 * EventEmitter Unit Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter, type EventMap } from './EventEmitter';
import { Logger, LogLevel } from './Logger';

interface TestEvents extends EventMap {
  stateChanged: string;
  positionChanged: number;
  resize: { width: number; height: number };
  navigateBack: undefined;
}

describe('EventEmitter', () => {
  let emitter: EventEmitter<TestEvents>;

  beforeEach(() => {
    emitter = new EventEmitter<TestEvents>();
  });

  afterEach(() => {
    Logger.setSink(null);
  });

  describe('on / off', () => {
    it('EVT-001: delivers payloads to every subscriber', () => {
      const a = vi.fn();
      const b = vi.fn();
      emitter.on('positionChanged', a);
      emitter.on('positionChanged', b);

      emitter.emit('positionChanged', 1500);

      expect(a).toHaveBeenCalledWith(1500);
      expect(b).toHaveBeenCalledWith(1500);
    });

    it('EVT-002: the returned function unsubscribes', () => {
      const listener = vi.fn();
      const unsubscribe = emitter.on('stateChanged', listener);

      emitter.emit('stateChanged', 'playing');
      unsubscribe();
      emitter.emit('stateChanged', 'paused');

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith('playing');
    });

    it('EVT-003: off removes only the given listener', () => {
      const a = vi.fn();
      const b = vi.fn();
      emitter.on('resize', a);
      emitter.on('resize', b);

      emitter.off('resize', a);
      emitter.emit('resize', { width: 1280, height: 820 });

      expect(a).not.toHaveBeenCalled();
      expect(b).toHaveBeenCalledWith({ width: 1280, height: 820 });
      expect(emitter.listenerCount('resize')).toBe(1);
    });

    it('removing an unknown listener is a no-op', () => {
      expect(() => emitter.off('navigateBack', vi.fn())).not.toThrow();
      expect(emitter.listenerCount('navigateBack')).toBe(0);
    });
  });

  describe('emit', () => {
    it('does not throw without listeners', () => {
      expect(() => emitter.emit('stateChanged', 'idle')).not.toThrow();
    });

    it('EVT-004: a throwing listener is logged and others still run', () => {
      const sink = vi.fn();
      Logger.setSink(sink);
      const failing = vi.fn(() => {
        throw new Error('listener failed');
      });
      const healthy = vi.fn();
      emitter.on('stateChanged', failing);
      emitter.on('stateChanged', healthy);

      emitter.emit('stateChanged', 'error');

      expect(healthy).toHaveBeenCalledWith('error');
      expect(sink).toHaveBeenCalledWith(
        LogLevel.ERROR,
        '[EventEmitter]',
        'Error in event listener for "stateChanged":',
        expect.any(Error)
      );
    });

    it('a listener may unsubscribe itself during delivery', () => {
      const calls: string[] = [];
      const unsubscribe = emitter.on('stateChanged', (s) => {
        calls.push(`first:${s}`);
        unsubscribe();
      });
      emitter.on('stateChanged', (s) => calls.push(`second:${s}`));

      emitter.emit('stateChanged', 'playing');
      emitter.emit('stateChanged', 'paused');

      expect(calls).toEqual(['first:playing', 'second:playing', 'second:paused']);
    });
  });

  describe('once', () => {
    it('EVT-005: fires a single time', () => {
      const listener = vi.fn();
      emitter.once('navigateBack', listener);

      emitter.emit('navigateBack', undefined);
      emitter.emit('navigateBack', undefined);

      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('can be cancelled before it fires', () => {
      const listener = vi.fn();
      const unsubscribe = emitter.once('positionChanged', listener);
      unsubscribe();

      emitter.emit('positionChanged', 1);

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('removeAllListeners', () => {
    it('EVT-006: clears one event', () => {
      const a = vi.fn();
      const b = vi.fn();
      emitter.on('stateChanged', a);
      emitter.on('positionChanged', b);

      emitter.removeAllListeners('stateChanged');
      emitter.emit('stateChanged', 'playing');
      emitter.emit('positionChanged', 2);

      expect(a).not.toHaveBeenCalled();
      expect(b).toHaveBeenCalledWith(2);
    });

    it('EVT-007: clears every event when called without arguments', () => {
      const a = vi.fn();
      const b = vi.fn();
      emitter.on('stateChanged', a);
      emitter.on('positionChanged', b);

      emitter.removeAllListeners();
      emitter.emit('stateChanged', 'playing');
      emitter.emit('positionChanged', 2);

      expect(a).not.toHaveBeenCalled();
      expect(b).not.toHaveBeenCalled();
    });
  });
});
