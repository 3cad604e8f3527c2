import { AlertTriangle, Clock, Layers, RefreshCw, Search, ShieldAlert, Timer, X } from "lucide-react";
import { useEffect, useState, type ReactNode } from "react";
import { Badge } from "../components/ui/badge";
import { Card, CardContent, CardHeader } from "../components/ui/card";
import { Input } from "../components/ui/input";
import type { DashboardSession, DashboardSnapshot } from "../session";
import type { BanCardView, BanListView } from "../view-model";

export function DashboardApp({ session }: { session: DashboardSession }) {
  const [snapshot, setSnapshot] = useState<DashboardSnapshot>(() => session.getSnapshot());

  useEffect(() => {
    const unsubscribe = session.subscribe(setSnapshot);
    void session.start();
    return () => {
      unsubscribe();
      session.stop();
    };
  }, [session]);

  return (
    <DashboardView
      snapshot={snapshot}
      onQueryChange={(query) => session.setQuery(query)}
      onClearQuery={() => session.clearQuery()}
      onRefresh={() => void session.refresh()}
    />
  );
}

export function DashboardView({
  snapshot,
  onQueryChange,
  onClearQuery,
  onRefresh,
}: {
  snapshot: DashboardSnapshot;
  onQueryChange: (query: string) => void;
  onClearQuery: () => void;
  onRefresh: () => void;
}) {
  const isFetching = snapshot.status === "fetching";
  const counts = snapshot.view?.counts;

  return (
    <div className="ban-dashboard">
      <header className="hero">
        <div>
          <p className="hero-kicker">Moderation</p>
          <h1>Ban Log</h1>
          <p>Live view of game bans with the affected player&apos;s profile.</p>
        </div>
        <div className="hero-actions">
          <span className="refresh-countdown" title="Next refresh">
            <Timer size={14} />
            {snapshot.countdown}
          </span>
          <button type="button" className="btn ghost" onClick={onRefresh}>
            <RefreshCw size={16} className={isFetching ? "spin" : ""} />
            Refresh
          </button>
        </div>
      </header>

      <section className="metrics">
        <MetricCard icon={<ShieldAlert size={16} />} label="Active bans" value={counts?.active ?? "--"} />
        <MetricCard icon={<Layers size={16} />} label="Total shown" value={counts?.total ?? "--"} />
        <MetricCard icon={<Clock size={16} />} label="Last updated" value={snapshot.lastUpdatedLabel} />
      </section>

      <section className="search-bar">
        <Search size={16} />
        <Input
          type="search"
          value={snapshot.query}
          placeholder="Search by name, user ID, moderator or reason"
          aria-label="Search bans"
          onChange={(event) => onQueryChange(event.target.value)}
        />
        <button type="button" className="btn subtle" onClick={onClearQuery} aria-label="Clear search">
          <X size={14} />
          Clear
        </button>
      </section>

      <BanGrid view={snapshot.view} error={snapshot.error} />
    </div>
  );
}

export function BanGrid({ view, error }: { view: BanListView | null; error: string | null }) {
  if (error) {
    return (
      <div className="ban-grid">
        <div className="error">
          <AlertTriangle size={16} />
          {`Could not load ban logs. ${error}`}
        </div>
      </div>
    );
  }

  if (!view) {
    return (
      <div className="ban-grid">
        <div className="loading">Loading ban logs...</div>
      </div>
    );
  }

  if (view.empty) {
    return (
      <div className="ban-grid">
        <div className="empty">No bans found for that search. Try another keyword.</div>
      </div>
    );
  }

  return (
    <div className="ban-grid">
      {view.cards.map((card) => (
        <BanCard key={card.key} card={card} />
      ))}
    </div>
  );
}

export function BanCard({ card }: { card: BanCardView }) {
  const started = card.relativeLabel ? `${card.startedLabel} • ${card.relativeLabel}` : card.startedLabel;

  return (
    <Card className={card.active ? "active" : "expired"}>
      <CardHeader>
        <div className="avatar">
          <img src={card.avatarUrl} alt={`Avatar for ${card.name}`} loading="lazy" />
        </div>
        <div className="identity">
          <div className="name-row">
            <h4>{card.name}</h4>
            <Badge variant="reason" className={card.reasonSlug}>
              {card.reasonLabel}
            </Badge>
          </div>
          <p className="muted">{`@${card.username} • ID ${card.userIdLabel}`}</p>
        </div>
        <Badge variant={card.active ? "live" : "ended"}>{card.statusLabel}</Badge>
      </CardHeader>
      <CardContent>
        <DetailPair label="Moderator">
          <span className="value">{card.moderatorLabel}</span>
        </DetailPair>
        <DetailPair label="Started">
          <span className="value">{started}</span>
        </DetailPair>
        <DetailPair label="Public reason">
          <p className="reason" title={card.reasonTitle}>
            {card.reasonLines.map((line, index) => (
              <span key={index} className="reason-line">
                {line}
              </span>
            ))}
          </p>
        </DetailPair>
        <DetailPair label="Flags" className="meta">
          <span className="chips">
            <Badge variant="chip">{card.altAccountsLabel}</Badge>
            <Badge variant="subtle">{card.referenceLabel}</Badge>
          </span>
        </DetailPair>
      </CardContent>
    </Card>
  );
}

function DetailPair({ label, className, children }: { label: string; className?: string; children: ReactNode }) {
  return (
    <div className={className ? `pair ${className}` : "pair"}>
      <span className="label">{label}</span>
      {children}
    </div>
  );
}

function MetricCard({ icon, label, value }: { icon: ReactNode; label: string; value: string | number }) {
  return (
    <article className="metric-card">
      <div className="metric-head">
        <span>{label}</span>
        {icon}
      </div>
      <p>{value}</p>
    </article>
  );
}
