/**
 * Binary Merkle tree over an ordered list of transaction identifiers.
 *
 * Hashes are lowercase hex without 0x. A parent is the digest of the UTF-8 text
 * `leftHex + rightHex`; an odd node at the end of a layer is paired with itself.
 * Both rules are part of the root format and must not change.
 */

import { hexlify, keccak256, sha256, sha512, toUtf8Bytes } from 'ethers';
import { z } from 'zod';
import { env } from '../config/env';
import {
  EmptyTreeError,
  IndexOutOfRangeError,
  InvalidInputError,
  MalformedProofError,
  TreeFinalizedError,
  TreeNotBuiltError,
} from '../eval/errors';

export type HashAlgorithm = 'sha256' | 'keccak256' | 'sha512';
export type LeafValue = string | Uint8Array;

export interface MerkleProofStep {
  position: 'left' | 'right';      // side of the sibling relative to the running hash
  hash: string;
}

const DIGESTS: Record<HashAlgorithm, { fn: (data: Uint8Array) => string; hexLength: number }> = {
  sha256: { fn: sha256, hexLength: 64 },
  keccak256: { fn: keccak256, hexLength: 64 },
  sha512: { fn: sha512, hexLength: 128 },
};

const HEX = /^[0-9a-f]+$/;

const ProofSchema = z.array(
  z.object({
    position: z.enum(['left', 'right']),
    hash: z.string().min(1),
  })
);

function strip0x(hex: string): string {
  return hex.startsWith('0x') || hex.startsWith('0X') ? hex.slice(2) : hex;
}

export function normalizeHash(hex: string): string {
  return strip0x(hex).toLowerCase();
}

function digest(data: Uint8Array, algorithm: HashAlgorithm): string {
  return strip0x(DIGESTS[algorithm].fn(data));
}

function hashText(text: string, algorithm: HashAlgorithm): string {
  return digest(toUtf8Bytes(text), algorithm);
}

/** Digest of a raw leaf: UTF-8 bytes for strings, the bytes themselves otherwise. */
export function hashLeaf(value: LeafValue, algorithm: HashAlgorithm = env.MERKLE_HASH_ALGORITHM): string {
  return typeof value === 'string' ? hashText(value, algorithm) : digest(value, algorithm);
}

export function hashPair(left: string, right: string, algorithm: HashAlgorithm): string {
  return hashText(left + right, algorithm);
}

function asDigest(value: LeafValue, algorithm: HashAlgorithm): string {
  const hex = typeof value === 'string' ? normalizeHash(value) : strip0x(hexlify(value));
  const { hexLength } = DIGESTS[algorithm];
  if (hex.length !== hexLength || !HEX.test(hex)) {
    throw new InvalidInputError(`pre-hashed leaf is not a ${algorithm} digest: ${typeof value === 'string' ? value : hex}`);
  }
  return hex;
}

/**
 * Recomputes the root from a leaf hash and its proof. A wrong proof yields false;
 * only a structurally malformed proof throws.
 */
export function validateProof(
  proof: unknown,
  leafHash: string,
  root: string,
  algorithm: HashAlgorithm = env.MERKLE_HASH_ALGORITHM
): boolean {
  const parsed = ProofSchema.safeParse(proof);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    throw new MalformedProofError(`invalid proof at ${issue?.path.join('.') || 'root'}: ${issue?.message ?? 'unknown'}`);
  }

  let current = normalizeHash(leafHash);
  for (const step of parsed.data) {
    const sibling = normalizeHash(step.hash);
    current = step.position === 'left'
      ? hashPair(sibling, current, algorithm)
      : hashPair(current, sibling, algorithm);
  }
  return current === normalizeHash(root);
}

export class MerkleTree {
  readonly algorithm: HashAlgorithm;
  private readonly leaves: string[] = [];
  private layers: string[][] = [];
  private built = false;

  constructor(algorithm: HashAlgorithm = env.MERKLE_HASH_ALGORITHM) {
    if (!(algorithm in DIGESTS)) {
      throw new InvalidInputError(`unsupported hash algorithm: ${String(algorithm)}`);
    }
    this.algorithm = algorithm;
  }

  /** Builds a finished tree in one step. */
  static from(
    values: readonly LeafValue[],
    options: { algorithm?: HashAlgorithm; preHashed?: boolean } = {}
  ): MerkleTree {
    const tree = new MerkleTree(options.algorithm);
    tree.addLeaves(values, { preHashed: options.preHashed });
    tree.build();
    return tree;
  }

  get isBuilt(): boolean {
    return this.built;
  }

  get leafCount(): number {
    return this.leaves.length;
  }

  /**
   * Appends leaves in the given order. Values are hashed unless preHashed,
   * in which case they must already be digests of this tree's algorithm.
   */
  addLeaves(values: readonly LeafValue[], options: { preHashed?: boolean } = {}): this {
    if (this.built) throw new TreeFinalizedError();
    const hashed = values.map((v) => (options.preHashed ? asDigest(v, this.algorithm) : hashLeaf(v, this.algorithm)));
    this.leaves.push(...hashed);
    return this;
  }

  /** Finalizes the layers and returns the root. Calling it again is a no-op. */
  build(): string {
    if (this.built) return this.getRoot();
    if (this.leaves.length === 0) throw new EmptyTreeError();

    const layers: string[][] = [[...this.leaves]];
    let level = layers[0];
    while (level.length > 1) {
      const next: string[] = [];
      for (let i = 0; i < level.length; i += 2) {
        const left = level[i];
        const right = i + 1 < level.length ? level[i + 1] : left;
        next.push(hashPair(left, right, this.algorithm));
      }
      layers.push(next);
      level = next;
    }

    this.layers = layers;
    this.built = true;
    return this.getRoot();
  }

  getRoot(): string {
    if (!this.built) throw new TreeNotBuiltError();
    return this.layers[this.layers.length - 1][0];
  }

  getLeaf(index: number): string {
    this.assertIndex(index);
    return this.leaves[index];
  }

  getProof(index: number): MerkleProofStep[] {
    if (!this.built) throw new TreeNotBuiltError();
    this.assertIndex(index);

    const proof: MerkleProofStep[] = [];
    let current = index;
    for (let depth = 0; depth < this.layers.length - 1; depth++) {
      const level = this.layers[depth];
      const isLeft = current % 2 === 0;
      const siblingIndex = isLeft ? current + 1 : current - 1;
      proof.push({
        position: isLeft ? 'right' : 'left',
        hash: siblingIndex < level.length ? level[siblingIndex] : level[current],
      });
      current = Math.floor(current / 2);
    }
    return proof;
  }

  verify(proof: unknown, leafHash: string): boolean {
    return validateProof(proof, leafHash, this.getRoot(), this.algorithm);
  }

  getLayers(): string[][] {
    if (!this.built) throw new TreeNotBuiltError();
    return this.layers.map((layer) => [...layer]);
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.leaves.length) {
      throw new IndexOutOfRangeError(index, this.leaves.length);
    }
  }
}
