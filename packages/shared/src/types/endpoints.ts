/**
 * Fixed operation table: every client call maps to exactly one of these.
 */

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface CreateBackupBody {
  description: string;
}

/** Method, path relative to the base URL, and the optional JSON body. */
export interface EndpointRequest {
  method: HttpMethod;
  path: string;
  body?: CreateBackupBody;
}

export const endpoints = {
  getConfig: (): EndpointRequest => ({ method: 'GET', path: 'config' }),
  getStatus: (): EndpointRequest => ({ method: 'GET', path: 'status' }),
  startServer: (): EndpointRequest => ({ method: 'POST', path: 'status/start' }),
  stopServer: (): EndpointRequest => ({ method: 'POST', path: 'status/stop' }),
  restartServer: (): EndpointRequest => ({ method: 'POST', path: 'status/restart' }),
  listBackups: (): EndpointRequest => ({ method: 'GET', path: 'backup/list' }),
  createBackup: (description: string): EndpointRequest => ({
    method: 'POST',
    path: 'backup/create',
    body: { description },
  }),
  deleteBackup: (backupId: string): EndpointRequest => ({
    method: 'DELETE',
    path: `backup/delete?backup_id=${encodeURIComponent(backupId)}`,
  }),
  getMonitoringTimings: (): EndpointRequest => ({ method: 'GET', path: 'monitoring/timings' }),
  getMonitoringIncidences: (): EndpointRequest => ({ method: 'GET', path: 'monitoring/incidences' }),
} as const;

export type OperationName = keyof typeof endpoints;
