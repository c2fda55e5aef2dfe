export interface OutgoingMessage {
  id: string;
  body: string;
  traceId: string;
  delaySeconds?: number;
}

export interface BatchSendResult {
  successful: string[];
  failed: { id: string; message: string }[];
}

export interface QueueCounts {
  visible: number;
  /** null when the broker does not expose unacknowledged counts to this client */
  inFlight: number | null;
  delayed: number;
}

/** The external asynchronous queue, seen as send / batch send / attribute reads. */
export interface QueueTransport {
  readonly maxBatchSize: number;
  send(message: OutgoingMessage): Promise<string>;
  sendBatch(messages: OutgoingMessage[]): Promise<BatchSendResult>;
  counts(): Promise<QueueCounts>;
}
