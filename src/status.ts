import { APP_VERSION } from "./config";

/** Monotonic counters for knowledgebase activity since startup. */
export interface KnowledgebaseCounters {
  /** Successful index calls (text, passages or PDF). */
  documentsIndexed: number;
  /** Passages written across all successful index calls. */
  passagesIndexed: number;
  /** Queries answered (including empty results). */
  queriesServed: number;
  /** Documents whose stored passages were deleted. */
  documentsRemoved: number;
  /** PDFs that failed during directory ingestion. */
  ingestFailures: number;
}

/**
 * Mutable in-memory snapshot of server lifecycle + knowledgebase counters, served
 * from /health in HTTP mode.
 */
export interface ServerStatus {
  version: string;
  /** Passage store directory. */
  dataDir: string;
  /** Active transport in use: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  /** True once startup ingestion (if any) has finished. */
  ready: boolean;
  startedAt: string;
  counters: KnowledgebaseCounters;
}

/**
 * Class wrapper around mutable server status state. One instance is created by the
 * host and handed to the components that report into it.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      dataDir: initial?.dataDir ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      counters: initial?.counters ?? {
        documentsIndexed: 0,
        passagesIndexed: 0,
        queriesServed: 0,
        documentsRemoved: 0,
        ingestFailures: 0,
      },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public recordIndexed(passages: number) {
    this.data.counters.documentsIndexed += 1;
    this.data.counters.passagesIndexed += passages;
  }

  public recordQuery() {
    this.data.counters.queriesServed += 1;
  }

  public recordRemoved() {
    this.data.counters.documentsRemoved += 1;
  }

  public recordIngestFailure() {
    this.data.counters.ingestFailures += 1;
  }

  public markReady() {
    this.data.ready = true;
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }
}
