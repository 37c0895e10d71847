import type { FireEnvelope, PowerCommandData } from './api.js';
import type { VmConfigData, VmStatusData } from './vm.js';
import type { BackupCreatedData, BackupDeletedData, BackupEntry } from './backup.js';
import type { MonitoringIncidencesData, MonitoringTimingsData } from './monitoring.js';

/** `blocking` returns values directly; `async` wraps them in a Promise. */
export type ExecutionMode = 'blocking' | 'async';

export type Outcome<M extends ExecutionMode, T> = M extends 'async' ? Promise<T> : T;

/** The KVM operation set, implemented once per execution mode. */
export interface FireOperations<M extends ExecutionMode> {
  getConfig(): Outcome<M, FireEnvelope<VmConfigData>>;
  getStatus(): Outcome<M, FireEnvelope<VmStatusData>>;
  startServer(): Outcome<M, FireEnvelope<PowerCommandData>>;
  stopServer(): Outcome<M, FireEnvelope<PowerCommandData>>;
  restartServer(): Outcome<M, FireEnvelope<PowerCommandData>>;
  listBackups(): Outcome<M, FireEnvelope<BackupEntry[]>>;
  createBackup(description: string): Outcome<M, FireEnvelope<BackupCreatedData>>;
  deleteBackup(backupId: string): Outcome<M, FireEnvelope<BackupDeletedData>>;
  getMonitoringTimings(): Outcome<M, FireEnvelope<MonitoringTimingsData>>;
  getMonitoringIncidences(): Outcome<M, FireEnvelope<MonitoringIncidencesData>>;
}

export type VmOperations<M extends ExecutionMode> = Pick<
  FireOperations<M>,
  'getConfig' | 'getStatus' | 'startServer' | 'stopServer' | 'restartServer'
>;

export type BackupOperations<M extends ExecutionMode> = Pick<
  FireOperations<M>,
  'listBackups' | 'createBackup' | 'deleteBackup'
>;

export type MonitoringOperations<M extends ExecutionMode> = Pick<
  FireOperations<M>,
  'getMonitoringTimings' | 'getMonitoringIncidences'
>;
