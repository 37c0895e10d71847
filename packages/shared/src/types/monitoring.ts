/**
 * Monitoring payloads (24fire+ only).
 */

export interface MonitoringTiming {
  date: string;
  cpu: string;
  mem: string;
  /** Ping in ms. */
  ping: number;
}

export interface MonitoringTimingsData {
  timings: MonitoringTiming[];
}

export type StatisticWindow =
  | 'LAST_24_HOURS'
  | 'LAST_7_DAYS'
  | 'LAST_14_DAYS'
  | 'LAST_30_DAYS'
  | 'LAST_90_DAYS'
  | 'LAST_180_DAYS';

export interface IncidenceStatistic {
  /** Minutes of downtime in the window. */
  downtime: number;
  /** Percent */
  availability: number;
  incidences: number;
  longest_incidence: number;
  average_incidence: number;
}

export interface Incidence {
  start: string;
  end: string;
  downtime: number;
  type: 'PING_TIMEOUT' | 'VM_STOPPED' | string;
}

export interface MonitoringIncidencesData {
  statistic: Partial<Record<StatisticWindow, IncidenceStatistic>>;
  incidences: Incidence[];
}
