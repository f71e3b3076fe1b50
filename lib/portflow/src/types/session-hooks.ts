import type { Flow } from '../flow/flow';

/**
 * Types of session events
 */
export enum SessionEventType {
  FLOW_CREATED = 'flowCreated',
  FLOW_RENAMED = 'flowRenamed',
  FLOW_DELETED = 'flowDeleted',
}

export interface SessionEventHandlers {
  [SessionEventType.FLOW_CREATED]: (flow: Flow) => void;
  [SessionEventType.FLOW_RENAMED]: (flow: Flow, oldTitle: string) => void;
  [SessionEventType.FLOW_DELETED]: (flow: Flow) => void;
}
