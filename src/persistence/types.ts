import type { LedgerSnapshot } from './snapshot.js';

export interface StateStore {
  load(): Promise<LedgerSnapshot | null>;
  save(snapshot: LedgerSnapshot): Promise<void>;
  getType(): 'memory' | 'redis';
}
