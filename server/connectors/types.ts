import type { AudioFrame, MeetingMetadata } from "@shared/schema";
import type { FatalConnectorError } from "../pipeline/errors";

/**
 * Events a meeting connector delivers to its pipeline. A connector calls
 * `onReconnect` before sending frames from a renewed source.
 */
export interface ConnectorListener {
  onFrame(frame: AudioFrame): void;
  onDisconnect(reason: string): void;
  onReconnect(): void;
  onEnd(): void;
  onFatal(error: FatalConnectorError): void;
}

export interface MeetingConnector {
  readonly metadata: MeetingMetadata;
  attach(listener: ConnectorListener): void;
  join(): Promise<void>;
  leave(): Promise<void>;
}
