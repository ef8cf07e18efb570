/**
 * Shared type definitions for the Alarm Video Service
 */

/**
 * SourceRef - A device/type pair involved in an alarm
 */
export interface SourceRef {
  device: string;
  type: string;
}

/**
 * Condition - A rule condition that contributed to the alarm
 */
export interface Condition {
  type?: string;
  source?: string;
}

/**
 * Trigger - One activation instance inside an alarm
 * The enrichment fields are filled in by the delayed processor before storage
 */
export interface Trigger {
  key: string; // trigger type, e.g. motion
  device: string; // hardware address of the camera
  eventId: string; // external event id, primary idempotency key
  thumbnail?: string; // base64 JPEG, optionally as a data URL
  deviceName?: string;
  date?: string;
  eventKey?: string;
  videoKey?: string;
}

/**
 * AlarmRecord - Canonical alarm built from the webhook envelope
 * `timestamp` always comes from the envelope, in milliseconds since epoch
 */
export interface AlarmRecord {
  name?: string;
  sources?: SourceRef[];
  conditions?: Condition[];
  triggers: Trigger[];
  timestamp: number;
  eventPath?: string;
  eventLocalLink?: string;
}

/**
 * AlarmEnvelope - Raw body posted to the webhook route
 */
export interface AlarmEnvelope {
  alarm?: unknown;
  timestamp?: unknown;
}

export interface StorageKeyPair {
  metadataKey: string;
  videoKey: string;
  thumbnailKey: string;
}

/**
 * QueueMessageAttributes - Copied onto every queued alarm for DLQ triage
 */
export interface QueueMessageAttributes {
  eventId: string;
  device: string;
  timestamp: number;
}

export interface Credentials {
  hostname: string;
  username: string;
  password: string;
  apiKey?: string;
}

export interface DeviceMetadata {
  deviceName: string;
  deviceMac: string;
  archiveButtonX: number;
  archiveButtonY: number;
}

/**
 * IngestAck - Immediate response to the webhook sender
 */
export interface IngestAck {
  msg: string;
  eventId: string;
  device: string;
  processingDelay: number;
  messageId: string;
  estimatedProcessingTime: string;
}

/**
 * VideoLookup - Response for the latest-video and video-by-event queries
 */
export interface VideoLookup {
  downloadUrl: string;
  filename: string;
  videoKey: string;
  eventKey: string;
  eventId?: string;
  timestamp: number;
  eventDate: string;
  expiresAt: string;
  eventData: AlarmRecord | null;
  message: string;
}

export type ComponentHealth = 'healthy' | 'degraded' | 'unhealthy';

/**
 * HealthCheckResponse - Health check endpoint response
 */
export interface HealthCheckResponse {
  status: ComponentHealth;
  components: {
    storage: ComponentHealth;
    dlq?: ComponentHealth;
    dlqDepth?: number;
  };
}

/**
 * ErrorResponse - Body of every non-2xx JSON response
 */
export interface ErrorResponse {
  msg: string;
}
