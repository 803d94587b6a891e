import { average, count, countWhere, countWhereIn, groupTally, sumNumeric, topN } from '../store/aggregator.js';
import { CRITICAL_SEVERITIES, safetyScore, type OpsData } from '../dashboard/stats.js';

export type OpsSummary = {
  totalMaintenance: number;
  pending: number;
  completed: number;
  totalHours: number;
  averageHours: number;
  totalIncidents: number;
  critical: number;
  safetyScore: number;
  totalFlights: number;
  topMaintenanceTypes: Array<[string, number]>;
};

export function summarize(data: OpsData): OpsSummary {
  const critical = countWhereIn(data.safety, 'severity', CRITICAL_SEVERITIES);
  return {
    totalMaintenance: count(data.maintenance),
    pending: countWhere(data.maintenance, 'status', 'Pending'),
    completed: countWhere(data.maintenance, 'status', 'Completed'),
    totalHours: sumNumeric(data.maintenance, 'estimated_hours'),
    averageHours: average(data.maintenance, 'estimated_hours'),
    totalIncidents: count(data.safety),
    critical,
    safetyScore: safetyScore(critical),
    totalFlights: count(data.flight),
    topMaintenanceTypes: topN(groupTally(data.maintenance, 'type'), 5),
  };
}

// Plain-text summary handed to inference providers and the general answer.
export function buildContext(data: OpsData): string {
  const s = summarize(data);
  const lines = [
    'OPERATIONAL DATA SUMMARY:',
    '========================',
    'Maintenance:',
    `- Total Tasks: ${s.totalMaintenance}`,
    `- Pending: ${s.pending}`,
    `- Completed: ${s.completed}`,
    `- Total Hours: ${s.totalHours.toFixed(1)}`,
    `- Average Hours/Task: ${s.averageHours.toFixed(1)}`,
    '',
    'Safety:',
    `- Total Incidents: ${s.totalIncidents}`,
    `- Critical/High: ${s.critical}`,
    `- Safety Score: ${s.safetyScore}/100`,
    '',
    'Flights:',
    `- Total Flights: ${s.totalFlights}`,
    '',
    'Top Maintenance Types:',
    ...s.topMaintenanceTypes.map(([type, n]) => `- ${type}: ${n} times`),
  ];
  return lines.join('\n');
}
