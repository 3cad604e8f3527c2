import type { AppConfig } from "../config";
import type { FetchImpl } from "../lib/http";
import { formatAbsoluteTime } from "../lib/time";
import type { Loggers } from "../logger";
import { AvatarClient } from "../services/avatar-client";
import { BanLogClient, DEFAULT_BAN_LOG_ERROR } from "../services/ban-log-client";
import { enrichBanRecords, type ProfileSource } from "../services/enrichment";
import { IdentityClient } from "../services/identity-client";
import { ProfileCache } from "../services/profile-cache";
import { ProfileResolver } from "../services/profile-resolver";
import { RefreshScheduler, type RefreshState } from "../services/refresh-scheduler";
import { filterBanRecords } from "../services/search-filter";
import type { BanLogPage, EnrichedBanRecord } from "../types";
import { toBanListView, type BanListView } from "./view-model";

export interface DashboardSnapshot {
  status: RefreshState;
  query: string;
  view: BanListView | null;
  error: string | null;
  lastUpdatedAt: number | null;
  lastUpdatedLabel: string;
  countdown: string;
}

export interface BanLogSource {
  fetchPage(): Promise<BanLogPage>;
}

export interface DashboardSessionDependencies {
  banLog: BanLogSource;
  profiles: ProfileSource;
  now?: () => number;
}

interface RefreshResult {
  records: EnrichedBanRecord[];
  page: BanLogPage;
}

type Listener = (snapshot: DashboardSnapshot) => void;

/**
 * Owns every piece of mutable dashboard state: the enriched record set, the
 * active query, the refresh timers and the published snapshot. One instance
 * per page.
 */
export class DashboardSession {
  private readonly scheduler: RefreshScheduler<RefreshResult>;
  private readonly listeners = new Set<Listener>();
  private readonly now: () => number;

  private records: EnrichedBanRecord[] = [];
  private snapshot: DashboardSnapshot = {
    status: "idle",
    query: "",
    view: null,
    error: null,
    lastUpdatedAt: null,
    lastUpdatedLabel: "Never",
    countdown: "—",
  };

  constructor(
    private readonly config: AppConfig,
    private readonly loggers: Loggers,
    private readonly dependencies: DashboardSessionDependencies,
  ) {
    this.now = dependencies.now ?? (() => Date.now());
    this.scheduler = new RefreshScheduler<RefreshResult>({
      intervalMs: config.refresh.intervalMs,
      countdownTickMs: config.refresh.countdownTickMs,
      load: () => this.load(),
      onSuccess: (result, completedAt) => this.applyResult(result, completedAt),
      onError: (error) => this.applyError(error),
      onStateChange: (status) => this.publish({ status }),
      onCountdown: (countdown) => this.publish({ countdown }),
      logger: loggers.app,
      now: this.now,
    });
  }

  getSnapshot(): DashboardSnapshot {
    return this.snapshot;
  }

  get currentRecords(): readonly EnrichedBanRecord[] {
    return this.records;
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  start(): Promise<void> {
    this.loggers.app.info(
      {
        bansEndpoint: this.config.bansEndpoint,
        intervalMs: this.config.refresh.intervalMs,
      },
      "dashboard session started",
    );
    return this.scheduler.start();
  }

  stop(): void {
    this.scheduler.stop();
  }

  refresh(): Promise<void> {
    return this.scheduler.refreshNow();
  }

  /** While an error is shown or before the first load, the query is stored and applied on the next successful render. */
  setQuery(query: string): void {
    if (this.snapshot.error !== null || this.snapshot.view === null) {
      this.publish({ query });
      return;
    }

    this.publish({ query, view: this.buildView(query) });
  }

  clearQuery(): void {
    this.setQuery("");
  }

  private async load(): Promise<RefreshResult> {
    const page = await this.dependencies.banLog.fetchPage();
    const records = await enrichBanRecords(page.logs, this.dependencies.profiles);
    return { records, page };
  }

  private applyResult(result: RefreshResult, completedAt: number): void {
    this.records = result.records;

    if (result.page.nextPageToken) {
      this.loggers.app.warn(
        { pagesFetched: result.page.pagesFetched, records: result.records.length },
        "ban log was truncated by the backend page limit",
      );
    }

    this.publish({
      view: this.buildView(this.snapshot.query),
      error: null,
      lastUpdatedAt: completedAt,
      lastUpdatedLabel: formatAbsoluteTime(new Date(completedAt).toISOString(), this.config.timeZone),
    });
  }

  private applyError(error: unknown): void {
    const message = error instanceof Error && error.message ? error.message : DEFAULT_BAN_LOG_ERROR;
    this.publish({ error: message });
  }

  private buildView(query: string): BanListView {
    return toBanListView(filterBanRecords(this.records, query), {
      now: this.now(),
      timeZone: this.config.timeZone,
    });
  }

  private publish(patch: Partial<DashboardSnapshot>): void {
    this.snapshot = { ...this.snapshot, ...patch };
    for (const listener of this.listeners) {
      listener(this.snapshot);
    }
  }
}

export interface CreateDashboardSessionOptions {
  fetchImpl?: FetchImpl;
  now?: () => number;
}

export function createDashboardSession(
  config: AppConfig,
  loggers: Loggers,
  options: CreateDashboardSessionOptions = {},
): DashboardSession {
  const cache = new ProfileCache();
  const resolver = new ProfileResolver(
    cache,
    {
      identity: new IdentityClient(config.lookups, { fetchImpl: options.fetchImpl }),
      avatar: new AvatarClient(config.lookups, { fetchImpl: options.fetchImpl }),
    },
    loggers.lookups,
  );
  const banLog = new BanLogClient(config.bansEndpoint, { fetchImpl: options.fetchImpl });

  return new DashboardSession(config, loggers, {
    banLog,
    profiles: resolver,
    now: options.now,
  });
}
