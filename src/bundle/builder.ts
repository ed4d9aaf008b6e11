/**
 * Transaction bundles: signed transactions in execution order, sealed by a Merkle root
 */

import { env } from '../config/env';
import { InvalidInputError } from '../eval/errors';
import { createLogger } from '../utils/logger';
import { HashAlgorithm, MerkleProofStep, MerkleTree, validateProof } from './merkle';

const logger = createLogger('bundle');

export interface TransactionBundle {
  readonly id: string;
  readonly name: string;
  readonly txs: readonly string[];
  readonly leafHashes: readonly string[];
  readonly merkleRoot: string;
  readonly proofs: readonly (readonly MerkleProofStep[])[];
  readonly hashAlgorithm: HashAlgorithm;
  readonly relays: readonly string[];
  readonly timestamp: number;            // unix seconds
  readonly opportunityId?: string;
}

export interface BuildBundleOptions {
  name?: string;
  relays?: readonly string[];
  hashAlgorithm?: HashAlgorithm;
  opportunityId?: string;
  now?: () => number;                    // ms clock, injectable for tests
}

export interface SendBundleRequest {
  jsonrpc: '2.0';
  id: number;
  method: 'eth_sendBundle';
  params: [{
    txs: string[];
    blockNumber: string;
    minTimestamp: number;
    maxTimestamp: number;
  }];
}

/**
 * Network side of bundle delivery. Implementations own transport, auth and
 * signing headers; nothing in this package talks to a relay directly.
 */
export interface RelaySubmitter {
  submit(relay: string, payload: SendBundleRequest): Promise<void>;
}

export interface SubmissionReport {
  bundleId: string;
  targetBlock: number;
  accepted: string[];
  failed: Array<{ relay: string; error: string }>;
}

export function buildBundle(signedTxs: readonly string[], options: BuildBundleOptions = {}): TransactionBundle {
  const tree = MerkleTree.from(signedTxs, { algorithm: options.hashAlgorithm ?? env.MERKLE_HASH_ALGORITHM });
  const root = tree.build();
  const timestamp = Math.floor((options.now ?? Date.now)() / 1000);

  const proofs = signedTxs.map((_, i) => Object.freeze(tree.getProof(i)));
  const leafHashes = signedTxs.map((_, i) => tree.getLeaf(i));

  const bundle: TransactionBundle = Object.freeze({
    id: `bundle-${timestamp}-${root.slice(0, 12)}`,
    name: options.name ?? 'arbitrage',
    txs: Object.freeze([...signedTxs]),
    leafHashes: Object.freeze(leafHashes),
    merkleRoot: root,
    proofs: Object.freeze(proofs),
    hashAlgorithm: tree.algorithm,
    relays: Object.freeze([...(options.relays ?? env.RELAY_URLS)]),
    timestamp,
    ...(options.opportunityId ? { opportunityId: options.opportunityId } : {}),
  });

  logger.debug('bundle_built', { id: bundle.id, txs: signedTxs.length, root });
  return bundle;
}

/** True when every transaction's proof reproduces the bundle root. */
export function verifyBundle(bundle: TransactionBundle): boolean {
  if (bundle.txs.length !== bundle.proofs.length) return false;
  const rebuilt = MerkleTree.from(bundle.txs, { algorithm: bundle.hashAlgorithm });
  if (rebuilt.getRoot() !== bundle.merkleRoot) return false;
  return bundle.txs.every((_, i) =>
    validateProof(bundle.proofs[i], rebuilt.getLeaf(i), bundle.merkleRoot, bundle.hashAlgorithm)
  );
}

export function toSendBundlePayload(bundle: TransactionBundle, targetBlock: number, requestId = 1): SendBundleRequest {
  if (!Number.isSafeInteger(targetBlock) || targetBlock < 0) {
    throw new InvalidInputError(`targetBlock must be a non-negative integer, got ${targetBlock}`);
  }
  return {
    jsonrpc: '2.0',
    id: requestId,
    method: 'eth_sendBundle',
    params: [{
      txs: [...bundle.txs],
      blockNumber: `0x${targetBlock.toString(16)}`,
      minTimestamp: 0,
      maxTimestamp: 0,
    }],
  };
}

/**
 * Sends the bundle to each relay in turn. A relay failure is logged and reported,
 * never thrown, so one bad endpoint cannot block the rest.
 */
export async function submitBundle(
  bundle: TransactionBundle,
  targetBlock: number,
  submitter: RelaySubmitter
): Promise<SubmissionReport> {
  const payload = toSendBundlePayload(bundle, targetBlock);
  const report: SubmissionReport = { bundleId: bundle.id, targetBlock, accepted: [], failed: [] };

  for (const relay of bundle.relays) {
    try {
      await submitter.submit(relay, payload);
      report.accepted.push(relay);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('relay_submission_failed', { relay, bundleId: bundle.id, error: message });
      report.failed.push({ relay, error: message });
    }
  }

  logger.info('bundle_submitted', {
    bundleId: bundle.id,
    targetBlock,
    accepted: report.accepted.length,
    failed: report.failed.length,
  });
  return report;
}
