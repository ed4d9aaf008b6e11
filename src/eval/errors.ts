/**
 * Error taxonomy for the math engine and the bundle builder.
 * Every error here is a synchronous caller mistake; none is retried.
 */

export class ArbitrageCoreError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed numeric argument: negative or zero where forbidden, fee out of range. */
export class InvalidInputError extends ArbitrageCoreError {
  constructor(message: string) {
    super('invalid_input', message);
  }
}

export class InvalidPathError extends ArbitrageCoreError {
  constructor(message: string) {
    super('invalid_path', message);
  }
}

export class EmptyTreeError extends ArbitrageCoreError {
  constructor(message = 'merkle tree has no leaves') {
    super('empty_tree', message);
  }
}

export class TreeNotBuiltError extends ArbitrageCoreError {
  constructor(message = 'merkle tree has not been built') {
    super('tree_not_built', message);
  }
}

export class TreeFinalizedError extends ArbitrageCoreError {
  constructor(message = 'merkle tree is already built; start a new tree for new leaves') {
    super('tree_finalized', message);
  }
}

export class IndexOutOfRangeError extends ArbitrageCoreError {
  constructor(index: number, size: number) {
    super('index_out_of_range', `leaf index ${index} out of range for ${size} leaves`);
  }
}

export class MalformedProofError extends ArbitrageCoreError {
  constructor(message: string) {
    super('malformed_proof', message);
  }
}
