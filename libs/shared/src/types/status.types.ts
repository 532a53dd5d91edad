export type RecorderState = 'ready' | 'recording' | 'stopped' | (string & {});

/** Record written by the recorder process. Extra context fields pass through. */
export interface RecorderStatus {
  status: RecorderState;
  message: string;
  timestamp?: string;
  [key: string]: unknown;
}

export const SETTLED_RECORDER_STATES: readonly RecorderState[] = ['stopped', 'ready'];
