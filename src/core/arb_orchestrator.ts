/**
 * Main arbitrage orchestrator - reserve snapshots in, verifiable bundles out
 */

import { env } from '../config/env';
import { VenueRegistry } from '../config/venues';
import { ArbitrageMathEngine } from '../eval/model';
import { InvalidInputError } from '../eval/errors';
import { HashAlgorithm } from '../bundle/merkle';
import {
  buildBundle,
  RelaySubmitter,
  SubmissionReport,
  submitBundle,
  TransactionBundle,
} from '../bundle/builder';
import { createLogger, Logger } from '../utils/logger';
import { detectOpportunities, DetectOptions, OpportunityRecord, VenueReserveSnapshot } from './opportunities';

export interface OrchestratorConfig {
  engine: ArbitrageMathEngine;
  venues?: VenueRegistry;
  hashAlgorithm: HashAlgorithm;
  relays: readonly string[];
  submitter?: RelaySubmitter;
  logger: Logger;
  now: () => number;
}

export interface ScanStats {
  scans: number;
  opportunitiesFound: number;
  bundlesBuilt: number;
  lastScanMs: number;
  lastScanAt: number | null;
}

export class ArbOrchestrator {
  private config: OrchestratorConfig;
  private stats: ScanStats = {
    scans: 0,
    opportunitiesFound: 0,
    bundlesBuilt: 0,
    lastScanMs: 0,
    lastScanAt: null,
  };

  constructor(config?: Partial<OrchestratorConfig>) {
    this.config = {
      engine: new ArbitrageMathEngine(),
      hashAlgorithm: env.MERKLE_HASH_ALGORITHM,
      relays: env.RELAY_URLS,
      logger: createLogger('orchestrator'),
      now: Date.now,
      ...config
    };
  }

  get engine(): ArbitrageMathEngine {
    return this.config.engine;
  }

  /**
   * One scan cycle. The venue registry given here wins over the configured one.
   */
  scan(snapshots: readonly VenueReserveSnapshot[], options: DetectOptions = {}): OpportunityRecord[] {
    const startTime = this.config.now();
    const opportunities = detectOpportunities(this.config.engine, snapshots, {
      now: this.config.now,
      venues: this.config.venues,
      ...options,
    });

    this.stats.scans += 1;
    this.stats.opportunitiesFound += opportunities.length;
    this.stats.lastScanAt = startTime;
    this.stats.lastScanMs = this.config.now() - startTime;

    this.config.logger.info('scan_complete', {
      snapshots: snapshots.length,
      opportunities: opportunities.length,
      best: opportunities[0]?.expectedProfit.toFixed(6),
      ms: this.stats.lastScanMs,
    });
    return opportunities;
  }

  /**
   * Seals the signed transactions for an accepted opportunity into a bundle.
   */
  buildBundle(opportunity: OpportunityRecord, signedTxs: readonly string[]): TransactionBundle {
    if (!opportunity.isProfitable) {
      throw new InvalidInputError(`opportunity ${opportunity.id} is not profitable`);
    }
    const bundle = buildBundle(signedTxs, {
      name: `${opportunity.tokenIn}/${opportunity.tokenOut} ${opportunity.dex1}->${opportunity.dex2}`,
      relays: this.config.relays,
      hashAlgorithm: this.config.hashAlgorithm,
      opportunityId: opportunity.id,
      now: this.config.now,
    });
    this.stats.bundlesBuilt += 1;
    this.config.logger.info('bundle_ready', {
      bundleId: bundle.id,
      opportunityId: opportunity.id,
      root: bundle.merkleRoot,
      txs: bundle.txs.length,
    });
    return bundle;
  }

  async submitBundle(bundle: TransactionBundle, targetBlock: number): Promise<SubmissionReport> {
    if (!this.config.submitter) {
      throw new InvalidInputError('no relay submitter configured');
    }
    return submitBundle(bundle, targetBlock, this.config.submitter);
  }

  /** Build then submit, for callers that have already signed the legs. */
  async execute(
    opportunity: OpportunityRecord,
    signedTxs: readonly string[],
    targetBlock: number
  ): Promise<{ bundle: TransactionBundle; report: SubmissionReport }> {
    const bundle = this.buildBundle(opportunity, signedTxs);
    const report = await this.submitBundle(bundle, targetBlock);
    return { bundle, report };
  }

  getStats(): ScanStats {
    return { ...this.stats };
  }
}
