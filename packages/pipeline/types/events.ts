// Pipeline domain events
// Emitted while snapshots are built and per-user reports are generated

import { randomUUID } from 'node:crypto';

export type PipelineEventType =
  // Snapshot
  | 'CohortSelected'
  | 'ClustersBuilt'
  // Section state machine
  | 'SectionDrafting'
  | 'SectionValidating'
  | 'SectionAccepted'
  | 'SectionRetrying'
  | 'SectionFailed'
  | 'LlmCallRetried'
  // Gate & persistence
  | 'ReportScreened'
  | 'ReportSaved'
  | 'UserFailed';

export const PIPELINE_EVENT_TYPES: readonly PipelineEventType[] = [
  'CohortSelected', 'ClustersBuilt',
  'SectionDrafting', 'SectionValidating', 'SectionAccepted', 'SectionRetrying', 'SectionFailed',
  'LlmCallRetried', 'ReportScreened', 'ReportSaved', 'UserFailed',
];

export interface PipelineEvent<T = Record<string, unknown>> {
  eventId: string;
  type: PipelineEventType;
  timestamp: Date;
  payload: T;
}

export function createEvent(type: PipelineEventType, payload: Record<string, unknown>): PipelineEvent {
  return { eventId: randomUUID(), type, timestamp: new Date(), payload };
}

export interface EventBus {
  emit(event: PipelineEvent): void;
  on(type: PipelineEventType, handler: (event: PipelineEvent) => void): void;
}

// Simple in-process event bus implementation
export class SimpleEventBus implements EventBus {
  private handlers = new Map<PipelineEventType, Set<(event: PipelineEvent) => void>>();

  emit(event: PipelineEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (typeHandlers) {
      for (const handler of typeHandlers) {
        handler(event);
      }
    }
  }

  on(type: PipelineEventType, handler: (event: PipelineEvent) => void): void {
    let typeHandlers = this.handlers.get(type);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(type, typeHandlers);
    }
    typeHandlers.add(handler);
  }
}
