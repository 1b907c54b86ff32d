import type { ChannelReference, ChannelStatus, Quality, StreamState } from '../../types/stream.js';

/** Failure classes reported by the stream supervisor */
export enum StreamErrorKind {
  TOOL_UNAVAILABLE = 'ToolUnavailable',
  SPAWN_FAILURE = 'SpawnFailure',
  ABNORMAL_EXIT = 'AbnormalExit',
  /** Internal: graceful stop timed out and was escalated, never emitted */
  TERMINATION_TIMEOUT = 'TerminationTimeout',
  /** Raised by the viewer when a URL fails validation */
  INVALID_URL = 'InvalidUrl'
}

export type SupervisorEvents = {
  started: [channel: ChannelReference, quality: Quality];
  stopped: [];
  error: [message: string, kind: StreamErrorKind];
  stateChanged: [state: StreamState];
};

export type ViewerEvents = SupervisorEvents & {
  statusUpdate: [channel: ChannelReference, status: ChannelStatus, index: number];
};
