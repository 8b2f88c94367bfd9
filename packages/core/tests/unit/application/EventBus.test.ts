import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/application/EventBus.js';
import type { FieldSynthesizedEvent, ModelSynthesizedEvent } from '../../../src/domain/events/SynthesisEvents.js';
import type { Logger } from '../../../src/domain/ports/Logger.js';

function fieldEvent(field = 'age'): FieldSynthesizedEvent {
  return {
    type: 'field:synthesized',
    model: 'Person',
    field,
    alias: field,
    kind: 'integer',
    required: false,
    timestamp: 1700000000000,
  };
}

function modelEvent(): ModelSynthesizedEvent {
  return { type: 'model:synthesized', model: 'Person', fieldCount: 2, enumCount: 0, timestamp: 1700000000000 };
}

describe('EventBus', () => {
  it('should deliver a field event to its subscriber', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('field:synthesized', handler);

    const event = fieldEvent();
    bus.emit(event);
    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(event);
  });

  it('should not deliver model events to field subscribers', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('field:synthesized', handler);
    bus.emit(modelEvent());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should deliver a model event to every subscriber', () => {
    const bus = new EventBus();
    const audit = vi.fn();
    const metrics = vi.fn();

    bus.on('model:synthesized', audit);
    bus.on('model:synthesized', metrics);
    bus.emit(modelEvent());

    expect(audit).toHaveBeenCalledOnce();
    expect(metrics).toHaveBeenCalledOnce();
  });

  it('should stop delivering after off()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('field:synthesized', handler);
    bus.off('field:synthesized', handler);
    bus.emit(fieldEvent());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should log and continue when a handler throws', () => {
    const warn = vi.fn();
    const logger: Logger = { error: vi.fn(), warn, info: vi.fn(), debug: vi.fn() };
    const bus = new EventBus(logger);
    const failing = vi.fn(() => {
      throw new Error('handler exploded');
    });
    const good = vi.fn();

    bus.on('field:synthesized', failing);
    bus.on('field:synthesized', good);

    expect(() => {
      bus.emit(fieldEvent());
    }).not.toThrow();
    expect(good).toHaveBeenCalledOnce();
    expect(warn).toHaveBeenCalledWith("Event handler for 'field:synthesized' threw", {
      error: 'handler exploded',
    });
  });

  it('should deliver field and model events to onAny subscribers', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);
    const first = fieldEvent();
    const second = modelEvent();
    bus.emit(first);
    bus.emit(second);

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler).toHaveBeenCalledWith(first);
    expect(handler).toHaveBeenCalledWith(second);
  });

  it('should stop wildcard delivery after offAny()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);
    bus.offAny(handler);
    bus.emit(modelEvent());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should accept an event nobody listens to', () => {
    const bus = new EventBus();

    expect(() => {
      bus.emit(modelEvent());
    }).not.toThrow();
  });
});
