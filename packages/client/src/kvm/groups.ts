import type {
  BackupOperations,
  ExecutionMode,
  FireOperations,
  MonitoringOperations,
  VmOperations,
} from '@fire-kvm/shared';

export interface OperationGroups<M extends ExecutionMode> {
  vm: VmOperations<M>;
  backup: BackupOperations<M>;
  monitoring: MonitoringOperations<M>;
}

/** vm / backup / monitoring views bound to the client's own methods. */
export function groupOperations<M extends ExecutionMode>(ops: FireOperations<M>): OperationGroups<M> {
  return {
    vm: {
      getConfig: () => ops.getConfig(),
      getStatus: () => ops.getStatus(),
      startServer: () => ops.startServer(),
      stopServer: () => ops.stopServer(),
      restartServer: () => ops.restartServer(),
    },
    backup: {
      listBackups: () => ops.listBackups(),
      createBackup: (description) => ops.createBackup(description),
      deleteBackup: (backupId) => ops.deleteBackup(backupId),
    },
    monitoring: {
      getMonitoringTimings: () => ops.getMonitoringTimings(),
      getMonitoringIncidences: () => ops.getMonitoringIncidences(),
    },
  };
}
