import { getAlertStats, parseStatsDays, DEFAULT_STATS_DAYS } from "@/src/alerts/stats";
import { buildServices } from "@/src/platform/services";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

type AlertsPageProps = {
  searchParams: { days?: string };
};

const th = { textAlign: "left", borderBottom: "1px solid #ddd", padding: "8px" } as const;
const td = { padding: "8px", borderBottom: "1px solid #eee" } as const;

function percent(rate: number | null): string {
  return rate === null ? "–" : `${(rate * 100).toFixed(1)}%`;
}

function CountTable({ title, counts }: { title: string; counts: Record<string, number> }) {
  const rows = Object.entries(counts);
  return (
    <section style={{ marginTop: "24px" }}>
      <h2>{title}</h2>
      {rows.length === 0 ? (
        <p>None.</p>
      ) : (
        <table style={{ width: "100%", borderCollapse: "collapse" }}>
          <thead>
            <tr>
              <th style={th}>Key</th>
              <th style={th}>Count</th>
            </tr>
          </thead>
          <tbody>
            {rows.map(([key, count]) => (
              <tr key={key}>
                <td style={td}>{key}</td>
                <td style={td}>{count}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </section>
  );
}

export default async function AlertsPage({ searchParams }: AlertsPageProps) {
  const days = parseStatsDays(searchParams.days) ?? DEFAULT_STATS_DAYS;
  const services = buildServices();
  const stats = await getAlertStats(services.repo, services.now(), days);

  return (
    <main style={{ padding: "24px", fontFamily: "system-ui, sans-serif" }}>
      <h1>Alerts</h1>
      <p>
        Last {days} days (since {stats.since}). Success rate {percent(stats.alerts.successRate)}, click rate{" "}
        {percent(stats.alerts.clickRate)}, {stats.alerts.clicked} clicked of {stats.alerts.total} alerts.
      </p>

      <CountTable title="Alerts by status" counts={stats.alerts.byStatus} />
      <CountTable title="Alert failures" counts={stats.alerts.errorsByType} />

      <p style={{ marginTop: "24px" }}>
        {stats.batches.total} digest batches, {stats.batches.itemsSent} items sent.
      </p>
      <CountTable title="Batches by status" counts={stats.batches.byStatus} />
      <CountTable title="Batch failures" counts={stats.batches.errorsByType} />
    </main>
  );
}
