import { endpoints } from '@fire-kvm/shared';
import type {
  BackupCreatedData,
  BackupDeletedData,
  BackupEntry,
  FireEnvelope,
  FireOperations,
  MonitoringIncidencesData,
  MonitoringTimingsData,
  PowerCommandData,
  VmConfigData,
  VmStatusData,
} from '@fire-kvm/shared';
import { resolveConfig } from '../config.js';
import type { ClientConfig } from '../config.js';
import { BlockingRequestExecutor } from '../executor.js';
import { WorkerTransport } from '../transport/WorkerTransport.js';
import type { BlockingTransport } from '../transport/types.js';
import { groupOperations } from './groups.js';
import type { OperationGroups } from './groups.js';
import type { FireClientOptions } from './types.js';

/**
 * Blocking 24fire KVM client. Every call holds the calling thread until the
 * response arrives or the timeout elapses.
 *
 * @example
 * ```ts
 * const client = new FireApiClient({ apiKey: process.env.FIRE_API_KEY ?? '' });
 * const config = client.getConfig();
 * console.log(config.data.hostsystem.processor);
 * ```
 */
export class FireApiClient implements FireOperations<'blocking'> {
  readonly config: ClientConfig;
  readonly vm: OperationGroups<'blocking'>['vm'];
  readonly backup: OperationGroups<'blocking'>['backup'];
  readonly monitoring: OperationGroups<'blocking'>['monitoring'];
  private readonly executor: BlockingRequestExecutor;

  constructor(options: FireClientOptions<BlockingTransport>) {
    const { logger = console, transport = new WorkerTransport({ logger }), ...input } = options;
    this.config = resolveConfig(input);
    this.executor = new BlockingRequestExecutor(transport, {
      config: this.config,
      logger,
      source: 'FireApiClient',
    });
    const groups = groupOperations<'blocking'>(this);
    this.vm = groups.vm;
    this.backup = groups.backup;
    this.monitoring = groups.monitoring;
  }

  getConfig(): FireEnvelope<VmConfigData> {
    return this.executor.execute<VmConfigData>(endpoints.getConfig());
  }

  getStatus(): FireEnvelope<VmStatusData> {
    return this.executor.execute<VmStatusData>(endpoints.getStatus());
  }

  startServer(): FireEnvelope<PowerCommandData> {
    return this.executor.execute<PowerCommandData>(endpoints.startServer());
  }

  stopServer(): FireEnvelope<PowerCommandData> {
    return this.executor.execute<PowerCommandData>(endpoints.stopServer());
  }

  restartServer(): FireEnvelope<PowerCommandData> {
    return this.executor.execute<PowerCommandData>(endpoints.restartServer());
  }

  /** 24fire+ only. */
  listBackups(): FireEnvelope<BackupEntry[]> {
    return this.executor.execute<BackupEntry[]>(endpoints.listBackups());
  }

  /** 24fire+ only. Returns the new backup_id in `data`. */
  createBackup(description: string): FireEnvelope<BackupCreatedData> {
    return this.executor.execute<BackupCreatedData>(endpoints.createBackup(description));
  }

  /** 24fire+ only. */
  deleteBackup(backupId: string): FireEnvelope<BackupDeletedData> {
    return this.executor.execute<BackupDeletedData>(endpoints.deleteBackup(backupId));
  }

  getMonitoringTimings(): FireEnvelope<MonitoringTimingsData> {
    return this.executor.execute<MonitoringTimingsData>(endpoints.getMonitoringTimings());
  }

  getMonitoringIncidences(): FireEnvelope<MonitoringIncidencesData> {
    return this.executor.execute<MonitoringIncidencesData>(endpoints.getMonitoringIncidences());
  }
}
