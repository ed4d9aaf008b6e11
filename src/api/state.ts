import { OpportunityRecord } from "../core/opportunities";

export interface SystemStats {
  scans: number;
  recentOpportunities: number;
  bundlesBuilt: number;
  updatedAt: number;
}

const MAX_RECENT = 500;

class InMemoryState {
  private _opps: OpportunityRecord[] = [];
  private _scans = 0;
  private _bundles = 0;
  private _updated = Date.now();

  getRecentOpportunities(limit = 50): OpportunityRecord[] {
    return this._opps.slice(-limit).reverse();
  }

  getStats(): SystemStats {
    return {
      scans: this._scans,
      recentOpportunities: this._opps.length,
      bundlesBuilt: this._bundles,
      updatedAt: this._updated,
    };
  }

  recordScan(opps: readonly OpportunityRecord[]) {
    this._scans += 1;
    this._opps.push(...opps);
    if (this._opps.length > MAX_RECENT) this._opps.splice(0, this._opps.length - MAX_RECENT);
    this._updated = Date.now();
  }

  recordBundle() {
    this._bundles += 1;
    this._updated = Date.now();
  }

  // Newest first
  findOpportunity(id: string): OpportunityRecord | undefined {
    for (let i = this._opps.length - 1; i >= 0; i--) {
      if (this._opps[i].id === id) return this._opps[i];
    }
    return undefined;
  }
}

export const State = new InMemoryState();
