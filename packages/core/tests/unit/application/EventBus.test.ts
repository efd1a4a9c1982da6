import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/application/EventBus.js';
import type { Logger } from '../../../src/domain/ports/Logger.js';
import type { LoadStartedEvent, CopyWrittenEvent } from '../../../src/domain/events/DomainEvents.js';

function startedEvent(): LoadStartedEvent {
  return {
    type: 'load:started',
    runId: 'run-1',
    datasets: ['full'],
    totalCopies: 2,
    timestamp: Date.now(),
  };
}

function writtenEvent(): CopyWrittenEvent {
  return {
    type: 'copy:written',
    runId: 'run-1',
    dataset: 'full',
    format: 'csv',
    destination: 'out/full.csv',
    bytesWritten: 128,
    timestamp: Date.now(),
  };
}

function recordingLogger(): Logger & { errors: unknown[][] } {
  const errors: unknown[][] = [];
  return {
    errors,
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: (message: string, error?: unknown) => {
      errors.push([message, error]);
    },
  };
}

describe('EventBus', () => {
  it('should emit events to registered handlers', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('load:started', handler);

    const event = startedEvent();
    bus.emit(event);
    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(event);
  });

  it('should not call handlers for different event types', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('load:started', handler);
    bus.emit(writtenEvent());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should support multiple handlers for the same event', () => {
    const bus = new EventBus();
    const handler1 = vi.fn();
    const handler2 = vi.fn();

    bus.on('copy:written', handler1);
    bus.on('copy:written', handler2);
    bus.emit(writtenEvent());

    expect(handler1).toHaveBeenCalledOnce();
    expect(handler2).toHaveBeenCalledOnce();
  });

  it('should remove handlers with off()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('load:started', handler);
    bus.off('load:started', handler);
    bus.emit(startedEvent());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should log and not propagate errors from throwing handlers', () => {
    const logger = recordingLogger();
    const bus = new EventBus(logger);
    const failure = new Error('handler exploded');

    bus.on('load:started', () => {
      throw failure;
    });

    expect(() => bus.emit(startedEvent())).not.toThrow();
    expect(logger.errors).toEqual([["Handler for 'load:started' threw", failure]]);
  });

  it('should continue calling other handlers when one throws', () => {
    const bus = new EventBus();
    const handler1 = vi.fn(() => {
      throw new Error('first handler fails');
    });
    const handler2 = vi.fn();

    bus.on('load:started', handler1);
    bus.on('load:started', handler2);
    bus.emit(startedEvent());

    expect(handler1).toHaveBeenCalledOnce();
    expect(handler2).toHaveBeenCalledOnce();
  });

  it('should call onAny handlers for every event type', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);

    const start = startedEvent();
    const written = writtenEvent();
    bus.emit(start);
    bus.emit(written);

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler).toHaveBeenNthCalledWith(1, start);
    expect(handler).toHaveBeenNthCalledWith(2, written);
  });

  it('should remove onAny handlers with offAny()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);
    bus.offAny(handler);
    bus.emit(startedEvent());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should call both typed and wildcard handlers', () => {
    const bus = new EventBus();
    const typed = vi.fn();
    const wildcard = vi.fn();

    bus.on('load:started', typed);
    bus.onAny(wildcard);
    bus.emit(startedEvent());

    expect(typed).toHaveBeenCalledOnce();
    expect(wildcard).toHaveBeenCalledOnce();
  });
});
