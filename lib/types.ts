/** Source kinds fetched over HTTP(S). */
export type HttpSourceType = 'list' | 'json' | 'html' | 'sha1' | 'whitelist';
/** Source kinds read from the local filesystem. */
export type FileSourceType = 'file' | 'whitelist_file';
/** Formats a custom adapter's payload may be normalized as. */
export type CustomPayloadFormat = 'list' | 'json' | 'html';

export type PayloadFormat = HttpSourceType | FileSourceType | 'ws';

interface SourceCommon {
  /** Identifier used for provenance and logs; the URL or path unless configured. */
  id: string;
  src: string;
  /** Ordered regex extraction stages (html payloads). */
  regex?: string[];
  /** Poll the source many times; each fetch may return a different subset. */
  scrape?: boolean;
  encoding?: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
}

export interface HttpSource extends SourceCommon {
  type: HttpSourceType;
}

export interface FileSource extends SourceCommon {
  type: FileSourceType;
  /** A missing file yields nothing instead of aborting the run. */
  ignoreMissing?: boolean;
}

export interface WebSocketSource extends SourceCommon {
  type: 'ws';
}

export interface CustomSource extends SourceCommon {
  type: 'custom';
  adapter: CustomAdapter;
  format: CustomPayloadFormat;
}

export type SourceDescriptor = HttpSource | FileSource | WebSocketSource | CustomSource;

export interface AdapterContext {
  timeoutMs: number;
  maxRetries: number;
  signal?: AbortSignal;
}

/**
 * A one-off multi-step fetch protocol for a single site. Returns the raw
 * payload, or null when any step fails.
 */
export interface CustomAdapter {
  readonly name: string;
  fetch(ctx: AdapterContext): Promise<Buffer | null>;
}

export type NormalizeResult =
  | { kind: 'domains'; candidates: string[] }
  | { kind: 'hashes'; hashes: string[]; rejected: number }
  | { kind: 'unusable'; reason: string };

export type AbsorbResult =
  | { kind: 'counted'; added: number; total: number }
  | { kind: 'whitelist'; accepted: boolean };

export type DnsRecordType = 'MX' | 'A';

export type DnsFailure = 'nxdomain' | 'refused' | 'no-answer' | 'timeout' | 'unresolved';

export type DnsAnswer =
  | { status: 'ok'; records: string[] }
  | { status: DnsFailure };

export type MxOutcome =
  | { kind: 'mail-capable' }
  | { kind: 'not-mail-capable'; reason: 'null-mx' | 'no-valid-address' }
  | { kind: 'indeterminate'; reason: DnsFailure };

export interface VerifyResult {
  domain: string;
  mailCapable: boolean;
  outcome: MxOutcome;
}

export type SourceStatus = 'ok' | 'whitelist' | 'hashes' | 'skipped' | 'failed' | 'unusable';

export interface SourceReport {
  id: string;
  type: SourceDescriptor['type'];
  status: SourceStatus;
  added: number;
  total: number;
  reason?: string;
}

export interface RunOptions {
  verifyDns?: boolean;
  /** Only process sources whose id contains this string (whitelists always run). */
  onlySource?: string;
  /** Abort the run when a source yields no usable result. */
  strict?: boolean;
  maxRetries?: number;
  dnsThreads?: number;
  dnsTimeoutMs?: number;
  dnsLifetimeMs?: number;
  dnsNameservers?: string[];
  dnsPort?: number;
  /** Log every domain that turned out not to accept mail. */
  listNoMx?: boolean;
  previous?: PreviousOutput;
}

export interface PreviousOutput {
  domains: string[];
  hashes: string[];
}

export interface RunDiff {
  addedDomains: string[];
  removedDomains: string[];
  addedHashes: number;
  removedHashes: number;
}

export interface StoreSnapshot {
  domains: string[];
  hashes: string[];
  skip: string[];
  legacy: string[];
  provenance: Record<string, string[]>;
  hashFailures: number;
}

export interface VerificationSummary {
  mailCapable: string[];
  notMailCapable: string[];
  indeterminate: string[];
}

export interface RunResult {
  snapshot: StoreSnapshot;
  reports: SourceReport[];
  diff: RunDiff;
  verification?: VerificationSummary;
}
