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
import { AsyncRequestExecutor } from '../executor.js';
import { FetchTransport } from '../transport/FetchTransport.js';
import type { AsyncTransport } from '../transport/types.js';
import { groupOperations } from './groups.js';
import type { OperationGroups } from './groups.js';
import type { FireClientOptions } from './types.js';

/**
 * Promise-based 24fire KVM client; same requests and errors as FireApiClient.
 *
 * @example
 * ```ts
 * const client = new AsyncFireApiClient({ apiKey: process.env.FIRE_API_KEY ?? '', timeoutMs: 10_000 });
 * const { data } = await client.backup.listBackups();
 * ```
 */
export class AsyncFireApiClient implements FireOperations<'async'> {
  readonly config: ClientConfig;
  readonly vm: OperationGroups<'async'>['vm'];
  readonly backup: OperationGroups<'async'>['backup'];
  readonly monitoring: OperationGroups<'async'>['monitoring'];
  private readonly executor: AsyncRequestExecutor;

  constructor(options: FireClientOptions<AsyncTransport>) {
    const { transport = new FetchTransport(), logger = console, ...input } = options;
    this.config = resolveConfig(input);
    this.executor = new AsyncRequestExecutor(transport, {
      config: this.config,
      logger,
      source: 'AsyncFireApiClient',
    });
    const groups = groupOperations<'async'>(this);
    this.vm = groups.vm;
    this.backup = groups.backup;
    this.monitoring = groups.monitoring;
  }

  getConfig(): Promise<FireEnvelope<VmConfigData>> {
    return this.executor.execute<VmConfigData>(endpoints.getConfig());
  }

  getStatus(): Promise<FireEnvelope<VmStatusData>> {
    return this.executor.execute<VmStatusData>(endpoints.getStatus());
  }

  startServer(): Promise<FireEnvelope<PowerCommandData>> {
    return this.executor.execute<PowerCommandData>(endpoints.startServer());
  }

  stopServer(): Promise<FireEnvelope<PowerCommandData>> {
    return this.executor.execute<PowerCommandData>(endpoints.stopServer());
  }

  restartServer(): Promise<FireEnvelope<PowerCommandData>> {
    return this.executor.execute<PowerCommandData>(endpoints.restartServer());
  }

  listBackups(): Promise<FireEnvelope<BackupEntry[]>> {
    return this.executor.execute<BackupEntry[]>(endpoints.listBackups());
  }

  createBackup(description: string): Promise<FireEnvelope<BackupCreatedData>> {
    return this.executor.execute<BackupCreatedData>(endpoints.createBackup(description));
  }

  deleteBackup(backupId: string): Promise<FireEnvelope<BackupDeletedData>> {
    return this.executor.execute<BackupDeletedData>(endpoints.deleteBackup(backupId));
  }

  getMonitoringTimings(): Promise<FireEnvelope<MonitoringTimingsData>> {
    return this.executor.execute<MonitoringTimingsData>(endpoints.getMonitoringTimings());
  }

  getMonitoringIncidences(): Promise<FireEnvelope<MonitoringIncidencesData>> {
    return this.executor.execute<MonitoringIncidencesData>(endpoints.getMonitoringIncidences());
  }
}
