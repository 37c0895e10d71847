/**
 * Backup payloads. Backups are a 24fire+ feature; without it the API answers 403.
 */

export interface BackupEntry {
  backup_id: string;
  backup_os: string;
  backup_description: string;
  /** Size in MB. */
  size: number;
  /** ISO timestamp */
  created: string;
  status: 'finished' | string;
}

export interface BackupCreatedData {
  backup_id: string;
}

/** `data` of a delete confirmation. */
export type BackupDeletedData = null;
