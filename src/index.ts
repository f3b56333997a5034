export * from './errors.js';
export * from './domain/types.js';
export * from './domain/money.js';
export * from './domain/computations.js';
export { JsonFile, writeFileAtomic, type FileSystem } from './store/jsonFile.js';
export { RecordStore, type StoreOptions, type RestoreResult } from './store/recordStore.js';
export { SettingsStore, type SettingsStoreOptions } from './store/settingsStore.js';
export { CredentialGate, DEFAULT_PIN_ATTEMPTS, type PinPrompt } from './auth/credentialGate.js';
export { hashPin, verifyPin, needsRehash, DEFAULT_SCRYPT, type ScryptParams } from './auth/pinHash.js';
export { toCsv, exportCsv } from './api/csvExport.js';
export { parseTransactionsCsv, decodeFileContent, CSV_COLUMNS, type CsvParseResult } from './api/csvParser.js';
export { loadConfig, ConfigError, type AppConfig, type CorruptPolicy } from './config.js';
