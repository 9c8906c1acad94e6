/**
 * Backup barrel export.
 */

export { BackupEngine, assertRestoreComplete } from './engine.js'
export type { BackupEngineOptions } from './engine.js'
export { readBackupFile, inspectBackup } from './file.js'
export { serializeSnapshot, parseSnapshot, snapshotSize, SNAPSHOT_FORMAT_VERSION } from './snapshot.js'
export type {
  BackupSnapshot,
  BackupInfo,
  CreateBackupOptions,
  RestoreOptions,
  RestoreReport,
  UnlockBackupOptions,
} from './types.js'
