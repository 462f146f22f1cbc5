export {
  loadAndMigrate,
  migrateManifest,
  readManifest,
  loadAndUpgradeSdaAccount,
  backupStore,
  MigrationResult,
  EntryLoadFailure,
} from './migrate';
export { EntryLoader, FileEntryLoader } from './entry-loader';
export { addAccount, accountFilename, isManifestEncrypted, MANIFEST_FILENAME, SECRET_FILE_EXTENSION } from './manifest';
export { saveManifest, openStore, getDefaultMaFilesDir, getManifestPath } from './store';
