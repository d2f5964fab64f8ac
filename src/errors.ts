export class NonceNotFoundError extends Error {
  constructor(
    readonly height: number,
    readonly difficultyBits: number,
    readonly maxNonce: number,
  ) {
    super(`No nonce below ${maxNonce} satisfies ${difficultyBits} difficulty bits for block #${height}`);
    this.name = 'NonceNotFoundError';
  }
}

// Raised by block stores when the backing database cannot serve a request.
export class StoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}

// Another writer already sealed a block at this height.
export class BlockConflictError extends Error {
  constructor(readonly height: number, options?: { cause?: unknown }) {
    super(`A block at height ${height} already exists`, options);
    this.name = 'BlockConflictError';
  }
}
