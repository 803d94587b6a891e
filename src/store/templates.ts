import { toCSV } from '../../utils/csv.js';
import type { CollectionId, RecordFields } from '../types/records.js';
import { fieldNames } from './schemas.js';

// Sample rows offered as downloadable import templates.
const TEMPLATE_ROWS: Record<CollectionId, RecordFields[]> = {
  maintenance: [
    {
      maintenance_date: '2025-01-15',
      aircraft: 'AP-BOC',
      type: 'A-Check',
      engineer: 'John Doe',
      priority: 'High',
      status: 'Pending',
      estimated_hours: 8,
      parts_replaced: 'Filter, Oil',
      notes: 'Routine check',
    },
    {
      maintenance_date: '2025-01-20',
      aircraft: 'AP-BOD',
      type: 'B-Check',
      engineer: 'Jane Smith',
      priority: 'Medium',
      status: 'In Progress',
      estimated_hours: 12,
      parts_replaced: 'Brake pads',
      notes: 'Scheduled maintenance',
    },
  ],
  safety: [
    {
      date: '2025-01-10',
      flight: 'PK-300',
      location: 'Karachi',
      type: 'Bird Strike',
      severity: 'Low',
      department: 'ground handling',
      description: 'Minor bird strike',
      reporter: 'Captain Ahmed',
      status: 'open',
    },
    {
      date: '2025-01-11',
      flight: 'PK-301',
      location: 'Islamabad',
      type: 'Technical Failure',
      severity: 'Medium',
      department: 'security',
      description: 'Hydraulic issue',
      reporter: 'First Officer Ali',
      status: 'closed',
    },
  ],
  flight: [
    {
      date: '2025-01-15',
      aircraft: 'AP-BOC',
      flight_number: 'PK-300',
      departure: 'KHI',
      arrival: 'ISB',
      pilot: 'Captain Ahmed',
      crew_count: 4,
      passengers: 150,
      notes: 'On-time departure, smooth flight',
    },
    {
      date: '2025-01-15',
      aircraft: 'AP-BOD',
      flight_number: 'PK-301',
      departure: 'ISB',
      arrival: 'KHI',
      pilot: 'Captain Ali',
      crew_count: 5,
      passengers: 180,
      notes: 'Special meal request for 5 passengers',
    },
  ],
};

export function templateCsv(collection: CollectionId): string {
  return toCSV(fieldNames(collection), TEMPLATE_ROWS[collection]);
}
