export type LinkKind = 'telegraph-page' | 'graph-page' | 'channel-post';

// Kind recorded in the ledger; both page hosts share one.
export type LedgerKind = 'page' | 'channel-post';

export interface ClassifiedLink {
  rawUrl: string;
  kind: LinkKind;
}

export interface PostReference {
  channelId: string;
  messageId: number;
  /** Platform handle for the channel: `-100<channelId>`. */
  peerId: string;
}

export type FetchStatus = 'downloaded' | 'empty' | 'skipped' | 'failed';

export interface FetchOutcome {
  link: string;
  kind: LinkKind;
  status: FetchStatus;
  folder?: string;
  files: number;
  failedFiles: number;
  error?: {
    code: string;
    message: string;
  };
}

export type InputEntry =
  | { type: 'all' }
  | { type: 'link'; link: ClassifiedLink }
  | { type: 'channel'; ref: string }
  | { type: 'unknown'; raw: string };

export function toLedgerKind(kind: LinkKind): LedgerKind {
  return kind === 'channel-post' ? 'channel-post' : 'page';
}
