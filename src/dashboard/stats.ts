import { count, countWhere, countWhereIn } from '../store/aggregator.js';
import type { RecordStore } from '../store/recordStore.js';
import type { FieldValue, OpsRecord } from '../types/records.js';

export type OpsData = {
  maintenance: readonly OpsRecord[];
  safety: readonly OpsRecord[];
  flight: readonly OpsRecord[];
};

export type Activity = {
  kind: 'maintenance' | 'safety' | 'flight';
  text: string;
};

export type Alert = {
  level: 'error' | 'warning' | 'success';
  message: string;
};

export type DashboardStats = {
  maintenance: { total: number; pending: number; completed: number; efficiency: number };
  safety: { total: number; critical: number; score: number };
  flights: { total: number };
  totalOperations: number;
  recentActivity: Activity[];
  alerts: Alert[];
};

export const CRITICAL_SEVERITIES = ['Critical', 'High'];
const PENDING_ALERT_THRESHOLD = 5;

export function collectData(store: RecordStore): OpsData {
  return {
    maintenance: store.snapshot('maintenance'),
    safety: store.snapshot('safety'),
    flight: store.snapshot('flight'),
  };
}

export const safetyScore = (critical: number) => Math.max(0, 100 - critical * 10);

const show = (value: FieldValue | undefined) =>
  value === undefined || String(value).trim() === '' ? 'N/A' : String(value);

function recentActivity(data: OpsData): Activity[] {
  const activities: Activity[] = [
    ...data.maintenance.slice(-3).map((m): Activity => ({
      kind: 'maintenance',
      text: `Maintenance: ${show(m.type)} on ${show(m.aircraft)}`,
    })),
    ...data.safety.slice(-3).map((s): Activity => ({
      kind: 'safety',
      text: `Safety: ${show(s.type)} [${show(s.severity)}]`,
    })),
    ...data.flight.slice(-3).map((f): Activity => ({
      kind: 'flight',
      text: `Flight: ${show(f.flight_number)}`,
    })),
  ];
  return activities.slice(-5);
}

export function buildDashboard(data: OpsData): DashboardStats {
  const total = count(data.maintenance);
  const pending = countWhere(data.maintenance, 'status', 'Pending');
  const completed = countWhere(data.maintenance, 'status', 'Completed');
  const critical = countWhereIn(data.safety, 'severity', CRITICAL_SEVERITIES);
  const efficiency = total > 0 ? Math.round(((total - pending) / total) * 1000) / 10 : 0;

  const alerts: Alert[] = [];
  if (critical > 0) alerts.push({ level: 'error', message: `${critical} critical safety incidents!` });
  if (pending > PENDING_ALERT_THRESHOLD) alerts.push({ level: 'warning', message: `${pending} maintenance tasks pending` });
  if (alerts.length === 0) alerts.push({ level: 'success', message: 'All systems operational' });

  return {
    maintenance: { total, pending, completed, efficiency },
    safety: { total: count(data.safety), critical, score: safetyScore(critical) },
    flights: { total: count(data.flight) },
    totalOperations: count(data.maintenance) + count(data.safety) + count(data.flight),
    recentActivity: recentActivity(data),
    alerts,
  };
}
