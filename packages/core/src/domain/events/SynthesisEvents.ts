/** Emitted after a column has been turned into a field. */
export interface FieldSynthesizedEvent {
  readonly type: 'field:synthesized';
  readonly model: string;
  readonly field: string;
  readonly alias: string;
  readonly kind: string;
  readonly required: boolean;
  readonly timestamp: number;
}

/** Emitted once every column of a model has been synthesized, before the model type is built. */
export interface ModelSynthesizedEvent {
  readonly type: 'model:synthesized';
  readonly model: string;
  readonly fieldCount: number;
  readonly enumCount: number;
  readonly timestamp: number;
}

/** Emitted when synthesis aborts. The error is rethrown to the caller unchanged. */
export interface SynthesisFailedEvent {
  readonly type: 'synthesis:failed';
  readonly model: string;
  readonly column?: string;
  readonly error: string;
  readonly timestamp: number;
}

export type SynthesisEvent = FieldSynthesizedEvent | ModelSynthesizedEvent | SynthesisFailedEvent;

export type SynthesisEventType = SynthesisEvent['type'];

export type SynthesisEventPayload<T extends SynthesisEventType> = Extract<SynthesisEvent, { type: T }>;
