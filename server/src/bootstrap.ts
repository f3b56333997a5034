import type { AppConfig, CorruptPolicy } from '../../src/config.js';
import { CorruptDataError } from '../../src/errors.js';
import { RecordStore } from '../../src/store/recordStore.js';
import { SettingsStore } from '../../src/store/settingsStore.js';

interface Loadable {
  load(): void;
  quarantine(): string | null;
}

/** Load a store, applying the configured policy when its file is corrupt */
export function loadOrRecover(store: Loadable, policy: CorruptPolicy): void {
  try {
    store.load();
  } catch (error) {
    if (error instanceof CorruptDataError && policy === 'start-empty') {
      console.warn(`[server] ${error.message}`);
      store.quarantine();
      return;
    }
    throw error;
  }
}

export function openStores(config: AppConfig): { records: RecordStore; settings: SettingsStore } {
  const settings = new SettingsStore(config.settingsFile);
  const records = new RecordStore(config.transactionsFile);
  loadOrRecover(settings, config.onCorrupt);
  loadOrRecover(records, config.onCorrupt);
  return { records, settings };
}
