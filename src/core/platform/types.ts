// src/core/platform/types.ts

export interface PlatformEntity {
  /** Stable identifier used to walk each channel at most once per run */
  id: string;
  title: string;
}

export interface PlatformMessage {
  id: number;
  text: string;
  hasMedia: boolean;
}

export interface HistoryFilter {
  /** Only messages that contain at least one URL */
  urlsOnly: boolean;
}

/**
 * Capabilities the crawler needs from a messaging platform. Implementations
 * raise ScrapeError with code `access_denied` when an entity or message
 * cannot be reached.
 */
export interface MessagingPlatform {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** `ref` is a username (`@name` or `name`) or a numeric peer id such as `-1001234` */
  resolveChannel(ref: string): Promise<PlatformEntity>;
  getMessage(entity: PlatformEntity, messageId: number): Promise<PlatformMessage | null>;
  /** Returns the path of the written file, or null when there was nothing to save */
  downloadMedia(message: PlatformMessage, folder: string): Promise<string | null>;
  iterHistory(entity: PlatformEntity, filter: HistoryFilter): AsyncIterable<PlatformMessage>;
  /** Channels and groups visible to the account */
  iterDialogs(): AsyncIterable<PlatformEntity>;
}
